/**
 * Unit tests for Logs Service
 */
import { describe, it, expect } from 'vitest'
import { buildHistogramSlots, resolveHistogramRange, toList } from '../service'

const epochSeconds = (iso: string) => Date.parse(iso) / 1000

describe('resolveHistogramRange', () => {
    const now = new Date('2026-01-02T12:00:00.000Z')

    it('should cover a whole UTC day', () => {
        expect(resolveHistogramRange({ date: '2026-01-01' }, now)).toEqual({
            start: new Date('2026-01-01T00:00:00.000Z'),
            end: new Date('2026-01-01T23:59:59.999Z'),
        })
    })

    it('should use an explicit range', () => {
        expect(
            resolveHistogramRange({ startDate: '2026-01-01T06:00:00.000Z', endDate: '2026-01-01T07:00:00.000Z' }, now)
        ).toEqual({
            start: new Date('2026-01-01T06:00:00.000Z'),
            end: new Date('2026-01-01T07:00:00.000Z'),
        })
    })

    it('should default to the last 24 hours', () => {
        expect(resolveHistogramRange({ startDate: '2026-01-01T06:00:00.000Z' }, now)).toEqual({
            start: new Date('2026-01-01T12:00:00.000Z'),
            end: now,
        })
    })
})

describe('buildHistogramSlots', () => {
    it('should align slots on buckets and keep empty ones', () => {
        const slots = buildHistogramSlots(
            new Date('2026-01-01T08:05:00.000Z'),
            new Date('2026-01-01T08:30:00.000Z'),
            [
                { bucket: epochSeconds('2026-01-01T08:10:00.000Z'), category: 'DOOR', count: 3 },
                { bucket: epochSeconds('2026-01-01T08:10:00.000Z'), category: 'MQTT', count: 1 },
            ],
            600
        )

        expect(slots).toEqual([
            { slot: '2026-01-01T08:00:00.000Z', counts: {} },
            { slot: '2026-01-01T08:10:00.000Z', counts: { DOOR: 3, MQTT: 1 } },
            { slot: '2026-01-01T08:20:00.000Z', counts: {} },
            { slot: '2026-01-01T08:30:00.000Z', counts: {} },
        ])
    })

    it('should keep rows that fall outside the generated slots', () => {
        const slots = buildHistogramSlots(
            new Date('2026-01-01T08:00:00.000Z'),
            new Date('2026-01-01T08:00:00.000Z'),
            [{ bucket: epochSeconds('2026-01-01T07:50:00.000Z'), category: 'DB', count: 2 }],
            600
        )

        expect(slots).toEqual([
            { slot: '2026-01-01T07:50:00.000Z', counts: { DB: 2 } },
            { slot: '2026-01-01T08:00:00.000Z', counts: {} },
        ])
    })
})

describe('toList', () => {
    it('should normalize single values and arrays', () => {
        expect(toList(undefined)).toEqual([])
        expect(toList('DOOR')).toEqual(['DOOR'])
        expect(toList(['DOOR', 'MQTT'])).toEqual(['DOOR', 'MQTT'])
    })
})
