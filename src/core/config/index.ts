/**
 * Reader configuration: zookeeper session settings, znode layout and codec.
 */

export {
    ReaderConfigSchema,
    ZooKeeperConfigSchema,
    ZNodeConfigSchema,
    type ReaderConfig,
    type ZooKeeperConfig,
    type ZNodeConfig
} from './interface'
export { ConfigLoader, DEFAULT_READER_CONFIG } from './default'
