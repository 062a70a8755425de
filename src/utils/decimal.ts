/**
 * decimal.ts — exact decimal arithmetic for allocation and rebalance math.
 *
 * Binary floats make `0.1 + 0.2 === 0.3` false, which breaks an exact
 * "percentages sum to 100" check. Every price, percentage and money amount
 * goes through decimal.js instead. The precision is set to decimal.js's
 * maximum, so sums, products and the terminating division by 100 never round.
 *
 * Usage:
 *   import { Dec } from '../utils/decimal.js'
 *
 *   Dec.of('0.1')                      // → Decimal 0.1
 *   Dec.sum(['0.1', '0.2'])            // → Decimal 0.3
 *   Dec.equals(Dec.sum(pcts), 100)     // → exact comparison, no epsilon
 *   Dec.targetValue(total, pct)        // → (total * pct) / 100
 *   Dec.wholeUnits(money, price)       // → floor(money / price), 0 for a zero price
 *   Dec.format(value, dp?)             // → fixed-point string, default 2 dp
 */
import { Decimal } from 'decimal.js'
import type { DecimalInput } from '../types/index.js'

// ─────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────

/** decimal.js MAX_DIGITS. A cap, not a cost: exact results stop at their own length */
const PRECISION = 1e9

const ExactDecimal = Decimal.clone({ precision: PRECISION, rounding: Decimal.ROUND_HALF_UP })

const HUNDRED = new ExactDecimal(100)
const ZERO = new ExactDecimal(0)

// ─────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────

export const Dec = {
    HUNDRED,
    ZERO,

    /** Wrap a raw value. JSON numbers are read through their shortest string form, so 0.1 stays 0.1 */
    of(value: DecimalInput): Decimal {
        return new ExactDecimal(value)
    },

    /** True when `value` parses to a finite decimal */
    isFiniteInput(value: DecimalInput): boolean {
        try {
            return new ExactDecimal(value).isFinite()
        } catch {
            return false
        }
    },

    sum(values: Iterable<DecimalInput>): Decimal {
        let total = ZERO
        for (const value of values) {
            total = total.plus(value)
        }
        return total
    },

    /** Exact equality. No epsilon: 99.99999999 is not 100 */
    equals(a: DecimalInput, b: DecimalInput): boolean {
        return new ExactDecimal(a).equals(b)
    },

    // ── Rebalance helpers ────────────────────

    /**
     * Money an asset should hold at `pct`% of `total`.
     * Returns 0 when the total is 0.
     */
    targetValue(total: DecimalInput, pct: DecimalInput): Decimal {
        const t = new ExactDecimal(total)
        if (t.isZero()) return ZERO
        return t.times(pct).dividedBy(HUNDRED)
    },

    /**
     * Largest whole number of units of `price` that `money` can pay for.
     * Truncates toward zero, never rounds up. A zero price buys nothing.
     */
    wholeUnits(money: DecimalInput, price: DecimalInput): number {
        const p = new ExactDecimal(price)
        if (p.isZero()) return 0
        return new ExactDecimal(money).dividedToIntegerBy(p).toNumber()
    },

    // ── Formatting (string output) ────────────

    format(value: DecimalInput, dp: number = 2): string {
        return new ExactDecimal(value).toFixed(dp)
    },
}
