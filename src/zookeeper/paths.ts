import type { ReaderConfig } from '../core/config/interface'
import { CoreBrandedTypeCreators, type ZNodePath } from '../core/types/branded'

export const ZNODE_SEPARATOR = '/'

/**
 * Join a parent znode path and a child name into a canonical path.
 * A trailing separator on the parent is not doubled.
 *
 * @example joinZNode('/wasp/table', 'orders') // '/wasp/table/orders'
 */
export function joinZNode(parent: string, child: string): string {
    const base = parent.endsWith(ZNODE_SEPARATOR) ? parent.slice(0, -1) : parent
    return `${base}${ZNODE_SEPARATOR}${child}`
}

/**
 * Well-known znode locations derived from configuration
 */
export class ZNodePaths {
    constructor(
        readonly baseZNode: ZNodePath,
        readonly tableZNode: ZNodePath,
    ) {}

    static fromConfig(config: Pick<ReaderConfig, 'znode'>): ZNodePaths {
        const baseZNode = CoreBrandedTypeCreators.createZNodePath(config.znode.parent)
        const tableZNode = CoreBrandedTypeCreators.createZNodePath(joinZNode(baseZNode, config.znode.table))
        return new ZNodePaths(baseZNode, tableZNode)
    }
}
