import type { Decimal } from 'decimal.js'
import { Dec } from '../utils/decimal.js'
import { InvalidAllocationError } from '../utils/errors.js'
import type { Position } from './position.js'
import type {
    AllocationIssue,
    AllocationValidationResult,
    AssetName,
    DecimalInput
} from '../types/index.js'

export interface AllocationEntry {
    readonly percentage: Decimal
    readonly asset: Position
}

export type AllocationEntryInput = readonly [percentage: DecimalInput, asset: Position]

/**
 * The distribution a portfolio is aiming for, e.g. 40% META / 60% AAPL.
 *
 * Only two ways in: `single` for the 100%-one-asset case, and `tryFrom`,
 * which refuses anything that does not add up to exactly 100 with strictly
 * positive, uniquely named entries.
 */
export class TargetAllocation {
    private readonly targets: readonly AllocationEntry[]
    private readonly names: ReadonlySet<AssetName>

    private constructor(targets: AllocationEntry[]) {
        this.targets = Object.freeze(targets.map(entry => Object.freeze({ ...entry })))
        this.names = new Set(targets.map(entry => entry.asset.name))
    }

    static single(asset: Position): TargetAllocation {
        return new TargetAllocation([{ percentage: Dec.HUNDRED, asset }])
    }

    /**
     * @throws InvalidAllocationError with the first failing rule, checked in the
     * order: non-positive percentage, duplicate asset, sum mismatch
     */
    static tryFrom(entries: Iterable<AllocationEntryInput>): TargetAllocation {
        const normalized = normalize(entries)
        const { valid, errors } = checkEntries(normalized)
        if (!valid) {
            throw new InvalidAllocationError(errors[0])
        }
        return new TargetAllocation(normalized)
    }

    /** Report every rule the entries break, without throwing */
    static validate(entries: Iterable<AllocationEntryInput>): AllocationValidationResult {
        return checkEntries(normalize(entries))
    }

    contains(name: AssetName): boolean {
        return this.names.has(name)
    }

    entries(): readonly AllocationEntry[] {
        return this.targets
    }
}

function normalize(entries: Iterable<AllocationEntryInput>): AllocationEntry[] {
    return Array.from(entries, ([percentage, asset]) => ({
        percentage: Dec.isFiniteInput(percentage) ? Dec.of(percentage) : Dec.of(Number.NaN),
        asset
    }))
}

function checkEntries(entries: AllocationEntry[]): AllocationValidationResult {
    const errors: AllocationIssue[] = []

    for (const { percentage, asset } of entries) {
        if (!percentage.isFinite() || percentage.lessThanOrEqualTo(0)) {
            errors.push({
                reason: 'NON_POSITIVE_PERCENTAGE',
                message: `Target percentage for ${asset.name} must be greater than 0 (got ${percentage.toString()})`,
                asset: asset.name
            })
        }
    }

    const seen = new Set<AssetName>()
    for (const { asset } of entries) {
        if (seen.has(asset.name)) {
            errors.push({
                reason: 'DUPLICATE_ASSET',
                message: `Asset ${asset.name} appears more than once in the target allocation`,
                asset: asset.name
            })
        }
        seen.add(asset.name)
    }

    const total = Dec.sum(entries.map(entry => entry.percentage))
    if (!Dec.equals(total, Dec.HUNDRED)) {
        errors.push({
            reason: 'SUM_MISMATCH',
            message: `Target percentages must sum to exactly 100 (got ${total.toString()})`
        })
    }

    return { valid: errors.length === 0, errors }
}
