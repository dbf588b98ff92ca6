/**
 * table-state-reader - uncached reads of table lifecycle state from ZooKeeper
 * Main entry point for the package
 */

// Table state queries - public API
export {
    TableStateReader,
    resolveState,
    isEnabled,
    isDisabled,
    isDisablingOrDisabled,
    listTablesInState,
    getDisabledTables,
    getDisabledOrDisablingTables,
    createTableStateSource,
    type TableStateSource
} from './table/reader'

export {
    TableState,
    TableStateSchema,
    TableStateRecordSchema,
    matches,
    matchesAny,
    type TableStateRecord
} from './table/state'

export {
    ProtobufTableStateCodec,
    JsonTableStateCodec,
    createTableStateCodec,
    type TableStateCodec,
    type TableStateCodecName
} from './table/codec'

// Coordination service
export type { CoordinationClient } from './zookeeper/client'
export {
    ZooKeeperCoordinationClient,
    isNoNodeError,
    getZooKeeperErrorCode,
    type ZooKeeperCallbackError,
    type ZooKeeperClientLike
} from './zookeeper/node-client'
export { joinZNode, ZNodePaths } from './zookeeper/paths'

// Errors and configuration
export * from './errors'
export * from './core'
