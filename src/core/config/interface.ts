import { z } from 'zod'

export const ZooKeeperConfigSchema = z.object({
    connectionString: z.string().min(1).describe('Comma-separated host:port list'),
    sessionTimeoutMs: z.number().int().positive(),
    spinDelayMs: z.number().int().nonnegative(),
    retries: z.number().int().nonnegative(),
})

export const ZNodeConfigSchema = z.object({
    parent: z.string().startsWith('/', 'Parent znode must be an absolute path'),
    table: z.string().min(1).refine(name => !name.includes('/'), 'Table znode must be a single path component'),
})

export const ReaderConfigSchema = z.object({
    zookeeper: ZooKeeperConfigSchema,
    znode: ZNodeConfigSchema,
    codec: z.enum(['protobuf', 'json']),
})

export type ZooKeeperConfig = z.infer<typeof ZooKeeperConfigSchema>
export type ZNodeConfig = z.infer<typeof ZNodeConfigSchema>
export type ReaderConfig = z.infer<typeof ReaderConfigSchema>
