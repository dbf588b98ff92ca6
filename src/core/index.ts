/**
 * Core module
 * Tree-shakable exports for configuration, validation and shared types
 */

// Configuration
export {
    ConfigLoader,
    DEFAULT_READER_CONFIG,
    ReaderConfigSchema,
    type ReaderConfig,
    type ZooKeeperConfig,
    type ZNodeConfig
} from './config';

// Branded types
export type {
    Brand,
    TableName,
    ZNodePath
} from './types/branded';

export {
    CoreBrandedTypeCreators
} from './types/branded';

// Validation patterns
export {
    CoreValidators,
    CORE_VALIDATION_PATTERNS
} from './validation/patterns';

export { isNullish, type Optional } from './types';
