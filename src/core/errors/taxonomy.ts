/**
 * Errors raised by the table state reader itself.
 *
 * Failures reported by the coordination client are not wrapped: they reach
 * the caller as the client produced them.
 */

export enum ErrorCategory {
    VALIDATION = 'VALIDATION',
    CONFIGURATION = 'CONFIGURATION',
    DATA = 'DATA',
}

export enum ErrorSeverity {
    /** Stored data cannot be trusted */
    CRITICAL = 'CRITICAL',
    ERROR = 'ERROR',
}

export interface ErrorCode {
    readonly code: string
    readonly category: ErrorCategory
    readonly severity: ErrorSeverity
    readonly message: string
    readonly suggestions: readonly string[]
}

export const TABLE_STATE_ERROR_CODES = {
    DATA_INCONSISTENCY: {
        code: 'TABLE_STATE_DATA_INCONSISTENCY',
        category: ErrorCategory.DATA,
        severity: ErrorSeverity.CRITICAL,
        message: 'Table state znode holds a payload that does not decode as a table state record',
        suggestions: ['Inspect the znode payload and rewrite the table state from the coordinator'],
    },
    INVALID_TABLE_NAME: {
        code: 'TABLE_STATE_INVALID_TABLE_NAME',
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.ERROR,
        message: 'Table name cannot be used as a znode child name',
        suggestions: ['Use a non-empty name without "/" that is not "." or ".."'],
    },
    INVALID_CONFIG: {
        code: 'TABLE_STATE_INVALID_CONFIG',
        category: ErrorCategory.CONFIGURATION,
        severity: ErrorSeverity.ERROR,
        message: 'Table state reader configuration is invalid',
        suggestions: ['Check TABLE_STATE_* environment variables and config overrides'],
    },
} satisfies Record<string, ErrorCode>

const errorCodesById: ReadonlyMap<string, ErrorCode> = new Map(
    Object.values(TABLE_STATE_ERROR_CODES).map(errorCode => [errorCode.code, errorCode]),
)

/** Look up one of the codes above by its string id */
export function getErrorCode(code: string): ErrorCode | undefined {
    return errorCodesById.get(code)
}

export abstract class TableStateError extends Error {
    readonly code: string
    readonly category: ErrorCategory
    readonly severity: ErrorSeverity
    readonly suggestions: readonly string[]
    readonly context: Record<string, unknown>
    /** Same value as `cause`, kept for callers that log it by name */
    readonly originalError?: unknown

    protected constructor(errorCode: ErrorCode, context: Record<string, unknown>, cause?: unknown) {
        super(errorCode.message, cause === undefined ? undefined : { cause })
        this.name = new.target.name
        this.code = errorCode.code
        this.category = errorCode.category
        this.severity = errorCode.severity
        this.suggestions = errorCode.suggestions
        this.context = context
        this.originalError = cause
    }
}

/** A table name that cannot be a znode child name */
export class ValidationError extends TableStateError {
    constructor(context: Record<string, unknown> = {}, cause?: unknown) {
        super(TABLE_STATE_ERROR_CODES.INVALID_TABLE_NAME, context, cause)
    }
}

/** Configuration that does not validate */
export class ConfigurationError extends TableStateError {
    constructor(context: Record<string, unknown> = {}, cause?: unknown) {
        super(TABLE_STATE_ERROR_CODES.INVALID_CONFIG, context, cause)
    }
}

/** A stored table state that does not decode; `cause` is the decode failure */
export class DataInconsistencyError extends TableStateError {
    constructor(context: Record<string, unknown> = {}, cause?: unknown) {
        super(TABLE_STATE_ERROR_CODES.DATA_INCONSISTENCY, context, cause)
    }
}

export function isTableStateError(error: unknown): error is TableStateError {
    return error instanceof TableStateError
}

export function isDataInconsistencyError(error: unknown): error is DataInconsistencyError {
    return error instanceof DataInconsistencyError
}
