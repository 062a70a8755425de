import pino from 'pino'

const isProduction = process.env.NODE_ENV === 'production'

// stdout carries the rebalance result; every log line goes to stderr
const destination = pino.destination({ dest: 2, sync: true })

const baseLogger = pino({
    level: process.env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
    base: {
        service: 'portfolio-rebalance',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    hooks: {
        // Accept logger.info('message', { fields }) as well as pino's native (fields, message)
        logMethod(args, method) {
            if (
                typeof args[0] === 'string' &&
                args[1] &&
                typeof args[1] === 'object' &&
                !Array.isArray(args[1])
            ) {
                const [message, obj, ...rest] = args
                method.apply(this, [obj, message, ...rest] as Parameters<typeof method>)
                return
            }
            method.apply(this, args)
        },
    },
}, destination)

type LoggerMethod = (...args: unknown[]) => void

type AppLogger = Omit<typeof baseLogger, 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace'> & {
    fatal: LoggerMethod
    error: LoggerMethod
    warn: LoggerMethod
    info: LoggerMethod
    debug: LoggerMethod
    trace: LoggerMethod
}

const logger = baseLogger as AppLogger

export { logger }
