import { z } from 'zod'
import type { Optional } from '../core/types'

/**
 * Lifecycle state of a table as recorded by the coordinator
 */
export enum TableState {
    ENABLED = 'ENABLED',
    DISABLED = 'DISABLED',
    DISABLING = 'DISABLING',
    ENABLING = 'ENABLING',
}

export const TableStateSchema = z.nativeEnum(TableState)

/**
 * Persisted table state record. `state` is the only field read here;
 * unknown fields written by newer coordinators are ignored.
 */
export const TableStateRecordSchema = z.object({
    state: TableStateSchema,
})

export type TableStateRecord = z.infer<typeof TableStateRecordSchema>

/**
 * True iff `actual` is present and equal to `expected`.
 * An absent state never matches.
 */
export function matches(expected: TableState, actual: Optional<TableState>): boolean {
    return actual !== undefined && actual === expected
}

/**
 * True iff `actual` matches any of `expected`
 */
export function matchesAny(expected: readonly TableState[], actual: Optional<TableState>): boolean {
    return expected.some(state => matches(state, actual))
}
