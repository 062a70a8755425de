import type { Decimal } from 'decimal.js'
import { groupHoldings, rebalance } from '../services/rebalancer.js'
import type { Position } from './position.js'
import type { TargetAllocation } from './targetAllocation.js'
import type { RebalanceSuggestion } from './rebalanceSuggestion.js'
import type { AssetName } from '../types/index.js'

/**
 * A snapshot of held positions together with the allocation they should
 * follow. Nothing here mutates after construction.
 */
export class Portfolio {
    private readonly held: readonly Position[]
    private readonly target: TargetAllocation

    constructor(positions: Iterable<Position>, allocation: TargetAllocation) {
        this.held = Object.freeze(Array.from(positions))
        this.target = allocation
    }

    positions(): readonly Position[] {
        return this.held
    }

    allocation(): TargetAllocation {
        return this.target
    }

    totalValue(): Decimal {
        return groupHoldings(this.held).totalValue
    }

    heldUnits(): Map<AssetName, number> {
        return groupHoldings(this.held).units
    }

    rebalance(): RebalanceSuggestion {
        return rebalance(this.held, this.target)
    }
}
