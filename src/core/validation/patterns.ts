/**
 * Validation patterns for znode names and paths
 * These patterns are compiled once and reused throughout the package
 */

export const CORE_VALIDATION_PATTERNS = {
    /** Single znode child name: no slash, no control characters */
    ZNODE_NAME: /^[^/\u0000-\u001f\u007f]+$/,

    /** Absolute znode path: "/" or "/a/b" without empty segments or trailing slash */
    ZNODE_PATH: /^\/(?:[^/\u0000-\u001f\u007f]+(?:\/[^/\u0000-\u001f\u007f]+)*)?$/,
} as const

/** Names ZooKeeper refuses as path components */
const RESERVED_ZNODE_NAMES: ReadonlySet<string> = new Set(['.', '..'])

export class CoreValidators {
    /**
     * Validates a table name for use as a child of the tables root
     * @returns true if the name is a legal, non-reserved znode child name
     */
    static isValidTableName(name: string): boolean {
        return typeof name === 'string' &&
               name.length > 0 &&
               !RESERVED_ZNODE_NAMES.has(name) &&
               CORE_VALIDATION_PATTERNS.ZNODE_NAME.test(name)
    }

    static isValidZNodePath(path: string): boolean {
        if (typeof path !== 'string' || !CORE_VALIDATION_PATTERNS.ZNODE_PATH.test(path)) {
            return false
        }
        return path.split('/').every(segment => segment !== '.' && segment !== '..')
    }
}
