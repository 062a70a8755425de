import type { AssetName, RebalanceSuggestionJSON } from '../types/index.js'

/**
 * Whole-unit trades for one rebalance run. Counts are always positive and an
 * asset never shows up on both sides.
 */
export class RebalanceSuggestion {
    readonly toBuy: ReadonlyMap<AssetName, number>
    readonly toSell: ReadonlyMap<AssetName, number>

    constructor(toBuy: ReadonlyMap<AssetName, number> = new Map(), toSell: ReadonlyMap<AssetName, number> = new Map()) {
        this.toBuy = new Map(toBuy)
        this.toSell = new Map(toSell)
    }

    static empty(): RebalanceSuggestion {
        return new RebalanceSuggestion()
    }

    isEmpty(): boolean {
        return this.toBuy.size === 0 && this.toSell.size === 0
    }

    /** Every asset with a trade, sells first */
    assets(): AssetName[] {
        return [...this.toSell.keys(), ...this.toBuy.keys()]
    }

    toJSON(): RebalanceSuggestionJSON {
        return {
            toBuy: Object.fromEntries(this.toBuy),
            toSell: Object.fromEntries(this.toSell)
        }
    }
}

export function formatSuggestion(suggestion: RebalanceSuggestion): string {
    if (suggestion.isEmpty()) {
        return 'Portfolio is balanced, no trades needed.'
    }

    const lines: string[] = []
    suggestion.toSell.forEach((units, asset) => {
        lines.push(`SELL ${units} ${asset}`)
    })
    suggestion.toBuy.forEach((units, asset) => {
        lines.push(`BUY  ${units} ${asset}`)
    })
    return lines.join('\n')
}
