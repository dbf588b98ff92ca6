import * as zookeeper from 'node-zookeeper-client'
import { getLogger, Logger } from '../log/utils'
import type { ReaderConfig } from '../core/config/interface'
import { isNullish, type Optional } from '../core/types'
import type { CoordinationClient } from './client'

/** The library types its exceptions apart from `Error` */
export type ZooKeeperCallbackError = Error | zookeeper.Exception | null | undefined

/**
 * Subset of the node-zookeeper-client `Client` used here.
 * The non-watching overloads of `getData` and `getChildren` only.
 */
export interface ZooKeeperClientLike {
    getData(path: string, callback: (error: ZooKeeperCallbackError, data?: Buffer | null) => void): void
    getChildren(path: string, callback: (error: ZooKeeperCallbackError, children?: string[]) => void): void
    close(): void
}

/**
 * Numeric ZooKeeper error code carried by a client exception, if any
 */
export function getZooKeeperErrorCode(error: unknown): Optional<number> {
    if (typeof error === 'object' && error !== null && 'getCode' in error && typeof error.getCode === 'function') {
        const code: unknown = error.getCode()
        return typeof code === 'number' ? code : undefined
    }
    return undefined
}

export function isNoNodeError(error: unknown): boolean {
    return getZooKeeperErrorCode(error) === zookeeper.Exception.NO_NODE
}

/**
 * CoordinationClient over a node-zookeeper-client session.
 *
 * A missing node reads as undefined and a missing parent lists as empty;
 * every other client error is rejected as-is.
 */
export class ZooKeeperCoordinationClient implements CoordinationClient {

    /**
     * Open a session from configuration. The caller owns the returned
     * client and must `close()` it.
     */
    static connect(config: Pick<ReaderConfig, 'zookeeper'>): ZooKeeperCoordinationClient {
        const client = zookeeper.createClient(config.zookeeper.connectionString, {
            sessionTimeout: config.zookeeper.sessionTimeoutMs,
            spinDelay: config.zookeeper.spinDelayMs,
            retries: config.zookeeper.retries,
        })
        client.connect()
        return new ZooKeeperCoordinationClient(client)
    }

    private readonly logger: Logger

    constructor(private readonly client: ZooKeeperClientLike, name = 'ZooKeeperCoordinationClient') {
        this.logger = getLogger(name)
    }

    readNode(path: string): Promise<Optional<Uint8Array>> {
        this.logger.debug(`Reading znode ${path}`)

        return new Promise((resolve, reject) => {
            this.client.getData(path, (error, data) => {
                if (error) {
                    if (isNoNodeError(error)) {
                        this.logger.debug(`Znode ${path} does not exist`)
                        resolve(undefined)
                        return
                    }
                    reject(error)
                    return
                }
                resolve(isNullish(data) ? undefined : data)
            })
        })
    }

    listChildren(parentPath: string): Promise<string[]> {
        this.logger.debug(`Listing children of znode ${parentPath}`)

        return new Promise((resolve, reject) => {
            this.client.getChildren(parentPath, (error, children) => {
                if (error) {
                    if (isNoNodeError(error)) {
                        this.logger.debug(`Znode ${parentPath} does not exist, no children`)
                        resolve([])
                        return
                    }
                    reject(error)
                    return
                }
                resolve(children ?? [])
            })
        })
    }

    close(): void {
        this.client.close()
    }
}
