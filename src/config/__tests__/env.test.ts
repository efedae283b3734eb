/**
 * Unit tests for environment parsing
 */
import { describe, it, expect } from 'vitest'
import { loadConfig } from '../env'

const required = { DB_USER: 'garage', DB_PASSWORD: 'test-secret', DB_NAME: 'garage_test' }

describe('loadConfig', () => {
    it('should apply the default door timings', () => {
        expect(loadConfig(required).doors).toEqual({
            processingDelayMs: 1050,
            statusTimeoutMs: 60000,
            requestTtlMs: 1200000,
        })
    })

    it('should read timings and ports as numbers', () => {
        const config = loadConfig({ ...required, DOOR_STATUS_TIMEOUT_MS: '30000', API_PORT: '8080' })

        expect(config.doors.statusTimeoutMs).toBe(30000)
        expect(config.api.port).toBe(8080)
    })

    it('should reject a timing that is not a number', () => {
        expect(() => loadConfig({ ...required, DOOR_STATUS_TIMEOUT_MS: '6o000' })).toThrow()
    })

    it('should reject zero, negative and fractional timings', () => {
        expect(() => loadConfig({ ...required, DOOR_PROCESSING_DELAY_MS: '0' })).toThrow()
        expect(() => loadConfig({ ...required, DOOR_REQUEST_TTL_MS: '-5' })).toThrow()
        expect(() => loadConfig({ ...required, DOOR_PROCESSING_DELAY_MS: '1.5' })).toThrow()
    })

    it('should reject a port that is not a number', () => {
        expect(() => loadConfig({ ...required, DB_PORT: 'pg' })).toThrow()
    })
})
