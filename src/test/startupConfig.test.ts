import { describe, it, expect, vi, beforeEach } from 'vitest'

const { loggerWarnMock } = vi.hoisted(() => ({ loggerWarnMock: vi.fn() }))

vi.mock('../utils/logger.js', () => ({
    logger: {
        warn: loggerWarnMock
    }
}))

import { buildStartupSummary, validateStartupConfigOrThrow } from '../config/startupConfig.js'

describe('validateStartupConfigOrThrow', () => {
    beforeEach(() => {
        loggerWarnMock.mockReset()
    })

    it('falls back to development defaults', () => {
        expect(validateStartupConfigOrThrow({})).toEqual({
            nodeEnv: 'development',
            logLevel: 'debug',
            outputFormat: 'text'
        })
    })

    it('defaults to info logging in production', () => {
        expect(validateStartupConfigOrThrow({ NODE_ENV: 'production' }).logLevel).toBe('info')
    })

    it('normalizes case and whitespace', () => {
        expect(validateStartupConfigOrThrow({
            NODE_ENV: ' Test ',
            LOG_LEVEL: 'WARN',
            REBALANCE_OUTPUT: 'JSON'
        })).toEqual({
            nodeEnv: 'test',
            logLevel: 'warn',
            outputFormat: 'json'
        })
    })

    it('collects every invalid value into one numbered error', () => {
        expect(() => validateStartupConfigOrThrow({
            NODE_ENV: 'staging',
            REBALANCE_OUTPUT: 'xml'
        })).toThrow([
            '[STARTUP-CONFIG] Validation failed.',
            "1. NODE_ENV 'staging' is invalid. Allowed values: development, test, production.",
            "2. REBALANCE_OUTPUT 'xml' is invalid. Allowed values: json, text.",
            'Fix the environment variables and run again.'
        ].join('\n'))
    })

    it('rejects an unknown log level', () => {
        expect(() => validateStartupConfigOrThrow({ LOG_LEVEL: 'verbose' })).toThrow(
            "1. LOG_LEVEL 'verbose' is invalid. Allowed values: fatal, error, warn, info, debug, trace, silent."
        )
    })

    it('warns about verbose logging in production', () => {
        validateStartupConfigOrThrow({ NODE_ENV: 'production', LOG_LEVEL: 'debug' })

        expect(loggerWarnMock).toHaveBeenCalledWith('[STARTUP-CONFIG] Warnings', {
            warnings: ['LOG_LEVEL is debug in production.']
        })
    })

    it('does not warn for a quiet production config', () => {
        validateStartupConfigOrThrow({ NODE_ENV: 'production' })

        expect(loggerWarnMock).not.toHaveBeenCalled()
    })
})

describe('buildStartupSummary', () => {
    it('lists the resolved settings', () => {
        expect(buildStartupSummary({ nodeEnv: 'test', logLevel: 'silent', outputFormat: 'json' })).toEqual({
            nodeEnv: 'test',
            logLevel: 'silent',
            outputFormat: 'json'
        })
    })
})
