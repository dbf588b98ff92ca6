import { getLogger } from '../log/utils'
import { DataInconsistencyError } from '../core/errors/taxonomy'
import { CoreBrandedTypeCreators, type TableName } from '../core/types/branded'
import { isNullish, type Optional } from '../core/types'
import type { CoordinationClient } from '../zookeeper/client'
import type { ReaderConfig } from '../core/config/interface'
import { joinZNode, ZNodePaths } from '../zookeeper/paths'
import { createTableStateCodec, ProtobufTableStateCodec, type TableStateCodec } from './codec'
import { TableState, matches, matchesAny } from './state'

const logger = getLogger('TableStateReader')

const DEFAULT_CODEC: TableStateCodec = new ProtobufTableStateCodec()

/**
 * Where table states live and how to read them. The client is borrowed
 * for the duration of a call; the reader never closes or keeps it.
 */
export interface TableStateSource {
    readonly client: CoordinationClient
    /** Tables root, e.g. `/wasp/table` */
    readonly tableZNode: string
    /** Defaults to the protobuf codec */
    readonly codec?: TableStateCodec
}

/**
 * Build a source from loaded configuration around a client the caller owns
 */
export function createTableStateSource(
    client: CoordinationClient,
    config: Pick<ReaderConfig, 'znode' | 'codec'>,
): TableStateSource {
    return {
        client,
        tableZNode: ZNodePaths.fromConfig(config).tableZNode,
        codec: createTableStateCodec(config.codec),
    }
}

/**
 * Go to the coordination service and read the state of `tableName`.
 * Nothing is cached: every call is a fresh read.
 *
 * @returns the recorded state, or undefined when the table has no znode or an empty one
 * @throws ValidationError if `tableName` cannot be a znode child name
 * @throws DataInconsistencyError if the znode payload does not decode
 */
export async function resolveState(source: TableStateSource, tableName: string): Promise<Optional<TableState>> {
    return readState(source, CoreBrandedTypeCreators.createTableName(tableName))
}

async function readState(source: TableStateSource, tableName: TableName): Promise<Optional<TableState>> {
    const path = joinZNode(source.tableZNode, tableName)
    const payload = await source.client.readNode(path)
    if (isNullish(payload) || payload.length === 0) {
        logger.debug(`No state recorded for table ${tableName} at ${path}`)
        return undefined
    }

    const codec = source.codec ?? DEFAULT_CODEC
    try {
        return codec.decode(payload).state
    } catch (error) {
        logger.warn(`Znode ${path} holds ${payload.length} bytes that are not a ${codec.name} table state record`)
        throw new DataInconsistencyError({
            tableName,
            path,
            payloadBytes: payload.length,
        }, error)
    }
}

/** True iff the table is recorded as DISABLED */
export async function isDisabled(source: TableStateSource, tableName: string): Promise<boolean> {
    return matches(TableState.DISABLED, await resolveState(source, tableName))
}

/** True iff the table is recorded as ENABLED */
export async function isEnabled(source: TableStateSource, tableName: string): Promise<boolean> {
    return matches(TableState.ENABLED, await resolveState(source, tableName))
}

/** True iff the table is recorded as DISABLING or DISABLED */
export async function isDisablingOrDisabled(source: TableStateSource, tableName: string): Promise<boolean> {
    return matchesAny([TableState.DISABLING, TableState.DISABLED], await resolveState(source, tableName))
}

/**
 * Names of all tables under the tables root whose recorded state is one of `predicate`.
 *
 * Children are read one at a time. A failure on any child rejects the
 * whole call; no partial set is returned.
 */
export async function listTablesInState(
    source: TableStateSource,
    predicate: TableState | readonly TableState[],
): Promise<Set<TableName>> {
    const wanted: readonly TableState[] = typeof predicate === 'string' ? [predicate] : predicate
    const children = await source.client.listChildren(source.tableZNode)
    logger.debug(`Found ${children.length} table znodes under ${source.tableZNode}`)

    const tables = new Set<TableName>()
    for (const child of children) {
        const tableName = CoreBrandedTypeCreators.createTableName(child)
        if (matchesAny(wanted, await readState(source, tableName))) {
            tables.add(tableName)
        }
    }

    logger.debug(`${tables.size} tables in state ${wanted.join('|')}`)
    return tables
}

/** Tables recorded as DISABLED; empty set if none */
export function getDisabledTables(source: TableStateSource): Promise<Set<TableName>> {
    return listTablesInState(source, TableState.DISABLED)
}

/** Tables recorded as DISABLED or DISABLING; empty set if none */
export function getDisabledOrDisablingTables(source: TableStateSource): Promise<Set<TableName>> {
    return listTablesInState(source, [TableState.DISABLED, TableState.DISABLING])
}

/**
 * Read-only, uncached table state queries grouped for callers that
 * prefer a single import.
 */
export const TableStateReader = Object.freeze({
    resolveState,
    isDisabled,
    isEnabled,
    isDisablingOrDisabled,
    listTablesInState,
    getDisabledTables,
    getDisabledOrDisablingTables,
})
