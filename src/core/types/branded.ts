/**
 * Branded types for znode names and paths
 */

import { ValidationError } from '../errors/taxonomy'
import { CoreValidators } from '../validation/patterns'

/**
 * Brand utility type for creating type-safe branded types
 */
export type Brand<T, TBrand> = T & { readonly __brand: TBrand }

/** A table name, usable as a single znode child name */
export type TableName = Brand<string, 'TableName'>

/** An absolute, slash-delimited znode path */
export type ZNodePath = Brand<string, 'ZNodePath'>

/**
 * Type creators that validate and brand values in one step
 */
export class CoreBrandedTypeCreators {
    /**
     * Creates a branded table name
     * @throws ValidationError if the name cannot be used as a znode child
     */
    static createTableName(value: string): TableName {
        if (!CoreValidators.isValidTableName(value)) {
            throw new ValidationError({ tableName: value })
        }
        return value as TableName
    }

    /**
     * Creates a branded znode path
     * @throws Error if the path is not absolute, has empty segments or uses '.' / '..'
     */
    static createZNodePath(value: string): ZNodePath {
        if (!CoreValidators.isValidZNodePath(value)) {
            throw new Error(`Invalid znode path: '${value}'`)
        }
        return value as ZNodePath
    }
}
