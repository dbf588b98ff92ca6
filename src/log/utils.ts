import { Logger as TsLogger, ILogObj } from 'tslog'

export type Logger = TsLogger<ILogObj>

const DEFAULT_LOG_LEVEL = 3

/**
 * tslog numeric level from environment, 0 (silly) to 6 (fatal).
 * Anything else falls back to info.
 */
function resolveMinLevel(raw: string | undefined): number {
    if (raw === undefined || raw.trim() === '') {
        return DEFAULT_LOG_LEVEL
    }
    const level = Number(raw)
    return Number.isInteger(level) && level >= 0 && level <= 6 ? level : DEFAULT_LOG_LEVEL
}

const mainLogger: Logger = new TsLogger<ILogObj>({
    name: 'table-state',
    type: 'pretty',
    minLevel: resolveMinLevel(process.env.TABLE_STATE_LOG_LEVEL),
    prettyLogTimeZone: 'UTC',
})

export function getLogger(name: string): Logger {
    return mainLogger.getSubLogger({ name })
}
