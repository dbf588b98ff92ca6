/**
 * In-memory stand-in for the coordination service.
 *
 * Nodes are stored by absolute path. Children of a path are the stored
 * paths exactly one level below it, listed in insertion order.
 *
 * @example
 * ```typescript
 * const zk = new InMemoryCoordinationClient()
 *     .withNode('/wasp/table')
 *     .withNode('/wasp/table/orders', protobuf.encode({ state: TableState.DISABLED }))
 * ```
 */

import type { Optional } from '../../src/core/types'
import type { CoordinationClient } from '../../src/zookeeper/client'
import { joinZNode } from '../../src/zookeeper/paths'
import { ProtobufTableStateCodec } from '../../src/table/codec'
import type { TableState } from '../../src/table/state'

export const TEST_TABLE_ZNODE = '/wasp/table'

export class InMemoryCoordinationClient implements CoordinationClient {
    private readonly nodes = new Map<string, Optional<Uint8Array>>()
    private readonly failures = new Map<string, Error>()

    readonly reads: string[] = []
    readonly listings: string[] = []

    withNode(path: string, data?: Uint8Array): this {
        this.nodes.set(path, data)
        return this
    }

    /** Any read or listing of `path` rejects with `error` */
    withFailure(path: string, error: Error): this {
        this.failures.set(path, error)
        return this
    }

    deleteNode(path: string): this {
        this.nodes.delete(path)
        return this
    }

    async readNode(path: string): Promise<Optional<Uint8Array>> {
        this.reads.push(path)
        const failure = this.failures.get(path)
        if (failure) {
            throw failure
        }
        return this.nodes.get(path)
    }

    async listChildren(parentPath: string): Promise<string[]> {
        this.listings.push(parentPath)
        const failure = this.failures.get(parentPath)
        if (failure) {
            throw failure
        }
        const prefix = joinZNode(parentPath, '')
        return [...this.nodes.keys()]
            .filter(path => path.startsWith(prefix) && !path.slice(prefix.length).includes('/') && path.length > prefix.length)
            .map(path => path.slice(prefix.length))
    }
}

const protobufCodec = new ProtobufTableStateCodec()

/** Protobuf payload for `state`, as the coordinator writes it */
export function encodeState(state: TableState): Uint8Array {
    return protobufCodec.encode({ state })
}

/**
 * Tables root populated with one znode per entry; `undefined` means an
 * empty znode, a Uint8Array is stored as the raw payload.
 */
export function createTablesRoot(tables: Record<string, TableState | Uint8Array | undefined>): InMemoryCoordinationClient {
    const client = new InMemoryCoordinationClient().withNode(TEST_TABLE_ZNODE)
    for (const [name, value] of Object.entries(tables)) {
        const path = joinZNode(TEST_TABLE_ZNODE, name)
        if (value === undefined) {
            client.withNode(path)
        } else if (value instanceof Uint8Array) {
            client.withNode(path, value)
        } else {
            client.withNode(path, encodeState(value))
        }
    }
    return client
}

/** Bytes that are not a protobuf Table message */
export const CORRUPT_PAYLOAD = new Uint8Array([0x6e, 0x6f, 0x74, 0x2d, 0x61, 0x2d, 0x74, 0x61, 0x62, 0x6c, 0x65])
