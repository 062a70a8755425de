import type { AllocationFailureReason, AllocationIssue } from '../types/index.js'

export type RebalanceErrorCode =
    | 'INVALID_ALLOCATION'
    | 'INVALID_PRICE'
    | 'INVALID_SNAPSHOT'
    | 'INTERNAL_ERROR'

export class RebalanceError extends Error {
    code: RebalanceErrorCode
    details?: unknown

    constructor(code: RebalanceErrorCode, message: string, details?: unknown) {
        super(message)
        this.name = 'RebalanceError'
        this.code = code
        this.details = details
    }
}

/**
 * Raised by TargetAllocation construction. `reason` tells a sum mismatch
 * apart from a non-positive or duplicated entry.
 */
export class InvalidAllocationError extends RebalanceError {
    readonly reason: AllocationFailureReason

    constructor(issue: AllocationIssue) {
        super('INVALID_ALLOCATION', issue.message, issue)
        this.name = 'InvalidAllocationError'
        this.reason = issue.reason
    }
}

export class InvalidPriceError extends RebalanceError {
    readonly assetName: string
    readonly price: string

    constructor(assetName: string, price: string) {
        super('INVALID_PRICE', `Price for ${assetName} must be a finite, non-negative decimal (got ${price})`, {
            asset: assetName,
            price
        })
        this.name = 'InvalidPriceError'
        this.assetName = assetName
        this.price = price
    }
}

export interface SnapshotIssue {
    field: string
    message: string
}

export class SnapshotValidationError extends RebalanceError {
    readonly issues: SnapshotIssue[]

    constructor(message: string, issues: SnapshotIssue[]) {
        super('INVALID_SNAPSHOT', message, issues)
        this.name = 'SnapshotValidationError'
        this.issues = issues
    }
}

export const internalError = (message: string, details?: unknown): RebalanceError =>
    new RebalanceError('INTERNAL_ERROR', message, details)

export const mapUnknownError = (error: unknown): RebalanceError => {
    if (error instanceof RebalanceError) return error

    if (error instanceof Error) {
        return internalError(error.message || 'Unexpected error')
    }

    return internalError('Unexpected error')
}
