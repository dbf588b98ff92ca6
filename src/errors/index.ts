/**
 * Error system module
 */

export {
    ErrorCategory,
    ErrorSeverity,
    TABLE_STATE_ERROR_CODES,
    getErrorCode,
    TableStateError,
    ValidationError,
    ConfigurationError,
    DataInconsistencyError,
    isTableStateError,
    isDataInconsistencyError,
    type ErrorCode
} from '../core/errors/taxonomy';
