import type { Decimal } from 'decimal.js'
import { Dec } from '../utils/decimal.js'
import { RebalanceSuggestion } from '../models/rebalanceSuggestion.js'
import type { Position } from '../models/position.js'
import type { TargetAllocation } from '../models/targetAllocation.js'
import type { AssetName } from '../types/index.js'

export interface Holdings {
    /** Unit count per asset, in first-seen order */
    units: Map<AssetName, number>
    /** Sum of every held unit at its own recorded price */
    totalValue: Decimal
}

export function groupHoldings(positions: Iterable<Position>): Holdings {
    const units = new Map<AssetName, number>()
    let totalValue = Dec.ZERO

    for (const position of positions) {
        units.set(position.name, (units.get(position.name) ?? 0) + 1)
        totalValue = totalValue.plus(position.currentPrice)
    }

    return { units, totalValue }
}

/**
 * Conservative rebalance: every target asset is bought or sold up to the
 * largest whole number of units whose value stays within its target share.
 * Whatever cannot be allocated in whole units stays as implicit cash.
 *
 * Targets are measured against the current total value, not the value left
 * after selling assets dropped from the allocation.
 */
export function rebalance(positions: Iterable<Position>, allocation: TargetAllocation): RebalanceSuggestion {
    const { units: held, totalValue } = groupHoldings(positions)

    if (totalValue.isZero()) {
        return RebalanceSuggestion.empty()
    }

    const toBuy = new Map<AssetName, number>()
    const toSell = new Map<AssetName, number>()

    // Full exit from anything the allocation no longer names
    held.forEach((count, name) => {
        if (!allocation.contains(name)) {
            toSell.set(name, count)
        }
    })

    for (const { percentage, asset } of allocation.entries()) {
        const targetMoney = Dec.targetValue(totalValue, percentage)
        const targetUnits = Dec.wholeUnits(targetMoney, asset.currentPrice)
        const heldUnits = held.get(asset.name) ?? 0

        if (targetUnits > heldUnits) {
            toBuy.set(asset.name, targetUnits - heldUnits)
        } else if (targetUnits < heldUnits) {
            toSell.set(asset.name, heldUnits - targetUnits)
        }
    }

    return new RebalanceSuggestion(toBuy, toSell)
}
