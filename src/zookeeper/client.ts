import type { Optional } from '../core/types'

/**
 * Read side of the coordination service, as consumed by the table state reader.
 * Neither call sets a watch.
 */
export interface CoordinationClient {
    /**
     * Payload of the node at `path`, or undefined if the node does not exist.
     * Communication failures reject with the client's own error.
     */
    readNode(path: string): Promise<Optional<Uint8Array>>

    /**
     * Names of the children of `parentPath`, in the order the service returns them.
     */
    listChildren(parentPath: string): Promise<string[]>
}
