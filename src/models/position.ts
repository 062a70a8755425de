import type { Decimal } from 'decimal.js'
import { Dec } from '../utils/decimal.js'
import { InvalidPriceError } from '../utils/errors.js'
import type { AssetName, DecimalInput } from '../types/index.js'

/**
 * One held unit of an asset at the price it was recorded with.
 * Holding ten shares means ten Position values with the same name.
 */
export class Position {
    readonly name: AssetName
    readonly currentPrice: Decimal

    constructor(name: AssetName, currentPrice: DecimalInput) {
        if (!Dec.isFiniteInput(currentPrice)) {
            throw new InvalidPriceError(name, String(currentPrice))
        }
        const price = Dec.of(currentPrice)
        if (price.isNegative() && !price.isZero()) {
            throw new InvalidPriceError(name, price.toString())
        }

        this.name = name
        this.currentPrice = price
        Object.freeze(this)
    }

    /** `count` identical units, convenient for building holdings */
    static units(name: AssetName, currentPrice: DecimalInput, count: number): Position[] {
        if (!Number.isInteger(count) || count < 0) {
            throw new RangeError(`Unit count for ${name} must be a non-negative integer (got ${count})`)
        }
        const unit = new Position(name, currentPrice)
        return Array.from({ length: count }, () => unit)
    }
}
