import { z } from 'zod'
import { Dec } from '../utils/decimal.js'

// JSON numbers or numeric strings; strings keep full precision ("0.1", "1234.5678")
const decimalValue = z.union([z.number(), z.string().trim().min(1)]).refine(
    (val) => Dec.isFiniteInput(val),
    { message: 'Must be a finite decimal number' }
)

const assetName = z.string().min(1, 'Asset name is required')

// One held unit
const unitHoldingSchema = z.object({
    name: assetName,
    price: decimalValue
}).strict()

// Several identical units recorded at the same price
const lotHoldingSchema = z.object({
    name: assetName,
    price: decimalValue,
    units: z.number().int('units must be a whole number').min(0, 'units must not be negative')
}).strict()

export const holdingSchema = z.union([lotHoldingSchema, unitHoldingSchema])

export const allocationEntrySchema = z.object({
    name: assetName,
    price: decimalValue,
    percentage: decimalValue
}).strict()

// Snapshot file: what is held and what it should look like
export const snapshotSchema = z.object({
    holdings: z.array(holdingSchema),
    allocation: z.array(allocationEntrySchema).min(1, 'allocation must have at least one entry')
}).strict()

export type HoldingInput = z.infer<typeof holdingSchema>
