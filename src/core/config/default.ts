import lodash from 'lodash'
import type { PartialDeep } from 'type-fest'
import { ZodError } from 'zod'
import { ConfigurationError } from '../errors/taxonomy'
import { getLogger } from '../../log/utils'
import { ReaderConfigSchema, type ReaderConfig, type ZNodeConfig, type ZooKeeperConfig } from './interface'

export const DEFAULT_READER_CONFIG: ReaderConfig = {
    zookeeper: {
        connectionString: 'localhost:2181',
        sessionTimeoutMs: 30000,
        spinDelayMs: 1000,
        retries: 0,
    },
    znode: {
        parent: '/wasp',
        table: 'table',
    },
    codec: 'protobuf',
}

type Env = Record<string, string | undefined>

/**
 * Loads reader configuration: defaults, then environment, then explicit overrides
 */
export class ConfigLoader {
    private static readonly logger = getLogger('ConfigLoader')

    /**
     * Reads TABLE_STATE_* variables. Unset or blank variables are skipped;
     * numeric variables are passed through as numbers (or NaN) so the schema reports them.
     */
    static fromEnv(env: Env = process.env): PartialDeep<ReaderConfig> {
        const config: PartialDeep<ReaderConfig> = {}
        const read = (key: string): string | undefined => {
            const value = env[key]
            return value === undefined || value.trim() === '' ? undefined : value.trim()
        }

        const quorum = read('TABLE_STATE_ZK_QUORUM')
        const sessionTimeout = read('TABLE_STATE_ZK_SESSION_TIMEOUT_MS')
        const parent = read('TABLE_STATE_ZNODE_PARENT')
        const table = read('TABLE_STATE_ZNODE_TABLE')
        const codec = read('TABLE_STATE_CODEC')

        if (quorum !== undefined || sessionTimeout !== undefined) {
            const zookeeper: PartialDeep<ZooKeeperConfig> = {}
            if (quorum !== undefined) zookeeper.connectionString = quorum
            if (sessionTimeout !== undefined) zookeeper.sessionTimeoutMs = Number(sessionTimeout)
            config.zookeeper = zookeeper
        }
        if (parent !== undefined || table !== undefined) {
            const znode: PartialDeep<ZNodeConfig> = {}
            if (parent !== undefined) znode.parent = parent
            if (table !== undefined) znode.table = table
            config.znode = znode
        }
        if (codec === 'protobuf' || codec === 'json') {
            config.codec = codec
        } else if (codec !== undefined) {
            throw new ConfigurationError({
                variable: 'TABLE_STATE_CODEC',
                value: codec,
            })
        }
        return config
    }

    /**
     * @throws ConfigurationError when the merged configuration does not validate
     */
    static load(overrides: PartialDeep<ReaderConfig> = {}, env: Env = process.env): ReaderConfig {
        const merged: unknown = lodash.merge({}, DEFAULT_READER_CONFIG, ConfigLoader.fromEnv(env), overrides)

        try {
            const config = ReaderConfigSchema.parse(merged)
            ConfigLoader.logger.debug(`Loaded configuration: ${JSON.stringify(config)}`)
            return config
        } catch (error) {
            if (error instanceof ZodError) {
                throw new ConfigurationError({
                    issues: error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
                }, error)
            }
            throw error
        }
    }
}
