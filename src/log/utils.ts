import pino from 'pino'
import type { Logger } from 'pino'
import { getDefaultOptionsConfig } from '../core/config'

export type { Logger }

let rootLogger: Logger | undefined

function getRootLogger(): Logger {
    if (!rootLogger) {
        rootLogger = pino({
            name: 'provisioning-options',
            level: getDefaultOptionsConfig().logLevel,
        })
    }
    return rootLogger
}

/**
 * Child logger tagged with the calling component's name
 */
export function getLogger(name: string): Logger {
    return getRootLogger().child({ component: name })
}
