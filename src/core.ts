export { Position } from './models/position.js'
export { TargetAllocation, type AllocationEntry, type AllocationEntryInput } from './models/targetAllocation.js'
export { Portfolio } from './models/portfolio.js'
export { RebalanceSuggestion, formatSuggestion } from './models/rebalanceSuggestion.js'
export { rebalance, groupHoldings, type Holdings } from './services/rebalancer.js'
export { parseSnapshot, loadSnapshotFile } from './services/snapshotLoader.js'
export {
    RebalanceError,
    InvalidAllocationError,
    InvalidPriceError,
    SnapshotValidationError,
    mapUnknownError
} from './utils/errors.js'
export { Dec } from './utils/decimal.js'
export type {
    AllocationFailureReason,
    AllocationIssue,
    AllocationValidationResult,
    AssetName,
    DecimalInput,
    RebalanceSuggestionJSON
} from './types/index.js'
