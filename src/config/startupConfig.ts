import { logger } from '../utils/logger.js'
import type { OutputFormat } from '../types/index.js'

export interface StartupConfig {
    nodeEnv: 'development' | 'test' | 'production'
    logLevel: string
    outputFormat: OutputFormat
}

const NODE_ENVS = new Set(['development', 'test', 'production'])
const LOG_LEVELS = new Set(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
const OUTPUT_FORMATS = new Set(['json', 'text'])

export function validateStartupConfigOrThrow(env: NodeJS.ProcessEnv = process.env): StartupConfig {
    const errors: string[] = []
    const warnings: string[] = []

    const nodeEnvRaw = (env.NODE_ENV || 'development').trim().toLowerCase()
    const nodeEnv = NODE_ENVS.has(nodeEnvRaw) ? (nodeEnvRaw as StartupConfig['nodeEnv']) : undefined
    if (!nodeEnv) {
        errors.push(`NODE_ENV '${env.NODE_ENV}' is invalid. Allowed values: development, test, production.`)
    }

    const defaultLevel = nodeEnv === 'production' ? 'info' : 'debug'
    const logLevel = (env.LOG_LEVEL || defaultLevel).trim().toLowerCase()
    if (!LOG_LEVELS.has(logLevel)) {
        errors.push(`LOG_LEVEL '${env.LOG_LEVEL}' is invalid. Allowed values: ${[...LOG_LEVELS].join(', ')}.`)
    }
    if (nodeEnv === 'production' && (logLevel === 'debug' || logLevel === 'trace')) {
        warnings.push(`LOG_LEVEL is ${logLevel} in production.`)
    }

    const outputRaw = (env.REBALANCE_OUTPUT || 'text').trim().toLowerCase()
    const outputFormat = OUTPUT_FORMATS.has(outputRaw) ? (outputRaw as OutputFormat) : undefined
    if (!outputFormat) {
        errors.push(`REBALANCE_OUTPUT '${env.REBALANCE_OUTPUT}' is invalid. Allowed values: json, text.`)
    }

    if (errors.length > 0) {
        const numberedErrors = errors.map((msg, idx) => `${idx + 1}. ${msg}`).join('\n')
        throw new Error(
            [
                '[STARTUP-CONFIG] Validation failed.',
                numberedErrors,
                'Fix the environment variables and run again.'
            ].join('\n')
        )
    }

    if (warnings.length > 0) {
        logger.warn('[STARTUP-CONFIG] Warnings', { warnings })
    }

    return {
        nodeEnv: nodeEnv || 'development',
        logLevel,
        outputFormat: outputFormat || 'text'
    }
}

export function buildStartupSummary(config: StartupConfig): Record<string, unknown> {
    return {
        nodeEnv: config.nodeEnv,
        logLevel: config.logLevel,
        outputFormat: config.outputFormat
    }
}
