import * as assert from 'assert'
import * as fc from 'fast-check'
import { TableState, TableStateRecordSchema, matches, matchesAny } from '../../../src/table/state'

const tableStateArb = fc.constantFrom(...Object.values(TableState))

describe('Table state', () => {

    describe('matches', () => {
        it('should never match an absent state', () => {
            fc.assert(fc.property(tableStateArb, (expected) => {
                assert.strictEqual(matches(expected, undefined), false)
            }))
        })

        it('should match only the same state', () => {
            fc.assert(fc.property(tableStateArb, tableStateArb, (expected, actual) => {
                assert.strictEqual(matches(expected, actual), expected === actual)
            }))
        })
    })

    describe('matchesAny', () => {
        it('should match when any expected state matches', () => {
            assert.strictEqual(matchesAny([TableState.DISABLING, TableState.DISABLED], TableState.DISABLED), true)
            assert.strictEqual(matchesAny([TableState.DISABLING, TableState.DISABLED], TableState.ENABLED), false)
            assert.strictEqual(matchesAny([TableState.DISABLING, TableState.DISABLED], undefined), false)
            assert.strictEqual(matchesAny([], TableState.ENABLED), false)
        })
    })

    describe('TableStateRecordSchema', () => {
        it('should accept every state', () => {
            fc.assert(fc.property(tableStateArb, (state) => {
                assert.deepStrictEqual(TableStateRecordSchema.parse({ state }), { state })
            }))
        })

        it('should reject values outside the closed set', () => {
            assert.strictEqual(TableStateRecordSchema.safeParse({ state: 'enabled' }).success, false)
            assert.strictEqual(TableStateRecordSchema.safeParse({ state: 0 }).success, false)
            assert.strictEqual(TableStateRecordSchema.safeParse({ state: null }).success, false)
            assert.strictEqual(TableStateRecordSchema.safeParse({}).success, false)
        })
    })
})
