import { readFile } from 'node:fs/promises'
import { ZodError } from 'zod'
import { Position } from '../models/position.js'
import { Portfolio } from '../models/portfolio.js'
import { TargetAllocation } from '../models/targetAllocation.js'
import { snapshotSchema, type HoldingInput } from '../api/validation.js'
import { SnapshotValidationError, type SnapshotIssue } from '../utils/errors.js'
import { logger } from '../utils/logger.js'

const formatIssues = (error: ZodError): SnapshotIssue[] =>
    error.issues.map(issue => ({
        field: issue.path.join('.'),
        message: issue.message
    }))

const expandHolding = (holding: HoldingInput): Position[] =>
    'units' in holding
        ? Position.units(holding.name, holding.price, holding.units)
        : [new Position(holding.name, holding.price)]

/**
 * Build a Portfolio from already-decoded JSON.
 *
 * Shape errors surface as SnapshotValidationError; allocation and price rule
 * violations keep their own error types.
 */
export function parseSnapshot(json: unknown): Portfolio {
    const result = snapshotSchema.safeParse(json)
    if (!result.success) {
        throw new SnapshotValidationError('Invalid portfolio snapshot', formatIssues(result.error))
    }

    const { holdings, allocation } = result.data
    const positions = holdings.flatMap(expandHolding)
    const target = TargetAllocation.tryFrom(
        allocation.map(entry => [entry.percentage, new Position(entry.name, entry.price)] as const)
    )

    return new Portfolio(positions, target)
}

export async function loadSnapshotFile(path: string): Promise<Portfolio> {
    const raw = await readFile(path, 'utf8')

    let json: unknown
    try {
        json = JSON.parse(raw)
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        throw new SnapshotValidationError(`Snapshot ${path} is not valid JSON`, [{ field: '', message }])
    }

    const portfolio = parseSnapshot(json)
    logger.debug('Loaded portfolio snapshot', {
        path,
        positions: portfolio.positions().length,
        assets: portfolio.heldUnits().size,
        targets: portfolio.allocation().entries().length
    })
    return portfolio
}
