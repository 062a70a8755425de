import { expect } from 'vitest'
import { Position } from '../models/position.js'

export function expectThrown<E extends Error>(fn: () => unknown, type: new (...args: never[]) => E): E {
    try {
        fn()
    } catch (error) {
        expect(error).toBeInstanceOf(type)
        if (error instanceof type) return error
    }
    throw new Error(`Expected ${type.name} to be thrown`)
}

/** Holdings from `{ NAME: [units, price] }` */
export const holdings = (lots: Record<string, [number, number | string]>): Position[] =>
    Object.entries(lots).flatMap(([name, [units, price]]) => Position.units(name, price, units))
