import { describe, it, expect } from 'vitest'
import { snapshotSchema } from '../api/validation.js'

const issuesOf = (input: unknown) => {
    const result = snapshotSchema.safeParse(input)
    return result.success
        ? []
        : result.error.issues.map(issue => ({ field: issue.path.join('.'), message: issue.message }))
}

describe('snapshotSchema', () => {
    it('accepts single units and lots with numeric or string decimals', () => {
        const result = snapshotSchema.safeParse({
            holdings: [
                { name: 'CASH', price: 1, units: 100 },
                { name: 'AAPL', price: ' 12.50 ' }
            ],
            allocation: [{ name: 'META', price: '25', percentage: 100 }]
        })

        if (!result.success) throw result.error
        expect(result.data.holdings).toEqual([
            { name: 'CASH', price: 1, units: 100 },
            { name: 'AAPL', price: '12.50' }
        ])
    })

    it('accepts an empty holdings list', () => {
        expect(issuesOf({ holdings: [], allocation: [{ name: 'META', price: 25, percentage: 100 }] })).toEqual([])
    })

    it('rejects an empty allocation', () => {
        expect(issuesOf({ holdings: [], allocation: [] })).toEqual([
            { field: 'allocation', message: 'allocation must have at least one entry' }
        ])
    })

    it('rejects non-numeric decimals', () => {
        expect(issuesOf({
            holdings: [],
            allocation: [{ name: 'META', price: 'lots', percentage: 100 }]
        })).toEqual([
            { field: 'allocation.0.price', message: 'Must be a finite decimal number' }
        ])
    })

    it('rejects unknown keys', () => {
        const issues = issuesOf({
            holdings: [],
            allocation: [{ name: 'META', price: 25, percentage: 100, weight: 1 }]
        })

        expect(issues).toHaveLength(1)
        expect(issues[0].field).toBe('allocation.0')
    })

    it('rejects fractional unit counts', () => {
        const issues = issuesOf({
            holdings: [{ name: 'CASH', price: 1, units: 1.5 }],
            allocation: [{ name: 'META', price: 25, percentage: 100 }]
        })

        expect(issues).toEqual([
            { field: 'holdings.0.units', message: 'units must be a whole number' }
        ])
    })

    it('requires an asset name', () => {
        expect(issuesOf({
            holdings: [],
            allocation: [{ name: '', price: 25, percentage: 100 }]
        })).toEqual([
            { field: 'allocation.0.name', message: 'Asset name is required' }
        ])
    })
})
