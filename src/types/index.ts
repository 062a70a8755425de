import type { Decimal } from 'decimal.js'

/** Anything decimal.js accepts: JSON numbers, numeric strings or an existing Decimal */
export type DecimalInput = Decimal.Value

/** Case-sensitive asset identifier, e.g. META, AAPL, CASH */
export type AssetName = string

export type AllocationFailureReason =
    | 'SUM_MISMATCH'
    | 'NON_POSITIVE_PERCENTAGE'
    | 'DUPLICATE_ASSET'

export interface AllocationIssue {
    reason: AllocationFailureReason
    message: string
    asset?: AssetName
}

export interface AllocationValidationResult {
    valid: boolean
    errors: AllocationIssue[]
}

export interface RebalanceSuggestionJSON {
    toBuy: Record<AssetName, number>
    toSell: Record<AssetName, number>
}

export type OutputFormat = 'json' | 'text'
