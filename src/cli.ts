import { validateStartupConfigOrThrow, buildStartupSummary } from './config/startupConfig.js'
import { loadSnapshotFile } from './services/snapshotLoader.js'
import { formatSuggestion } from './models/rebalanceSuggestion.js'
import { Dec } from './utils/decimal.js'
import { mapUnknownError } from './utils/errors.js'
import { logger } from './utils/logger.js'

export const USAGE = 'Usage: portfolio-rebalance <snapshot.json>'

/**
 * Load a snapshot, rebalance it and print the suggestion on stdout.
 * Resolves to the process exit code; failures are logged, never thrown.
 */
export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
    try {
        const config = validateStartupConfigOrThrow(env)
        logger.level = config.logLevel
        logger.debug('Startup configuration', buildStartupSummary(config))

        const [snapshotPath] = argv
        if (!snapshotPath) {
            process.stderr.write(`${USAGE}\n`)
            return 1
        }

        const portfolio = await loadSnapshotFile(snapshotPath)
        const suggestion = portfolio.rebalance()

        logger.info('Rebalance computed', {
            totalValue: Dec.format(portfolio.totalValue()),
            buys: suggestion.toBuy.size,
            sells: suggestion.toSell.size
        })

        const output = config.outputFormat === 'json'
            ? JSON.stringify(suggestion, null, 2)
            : formatSuggestion(suggestion)
        process.stdout.write(`${output}\n`)
        return 0
    } catch (error) {
        const mapped = mapUnknownError(error)
        logger.error('Rebalance failed', { code: mapped.code, error: mapped.message, details: mapped.details })
        return 1
    }
}
