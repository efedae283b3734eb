/**
 * Unit tests for the device type registry, using the bundled manifests
 */
import { describe, it, expect, beforeAll } from 'vitest'
import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { DeviceTypeRegistry } from '../registry'

describe('DeviceTypeRegistry', () => {
    const registry = new DeviceTypeRegistry()

    beforeAll(async () => {
        await registry.loadAll()
    })

    it('should load the bundled device types', () => {
        expect(registry.getDeviceTypes().sort()).toEqual(['all-clear', 'contact-sensor', 'garage-door', 'relay'])
    })

    it('should return a manifest by type', () => {
        expect(registry.getManifest('relay')).toMatchObject({ id: 'relay', role: 'actuator' })
        expect(registry.getManifest('dimmer')).toBeUndefined()
    })

    it('should know which commands a device type accepts', () => {
        expect(registry.isCommandSupported('relay', 'on')).toBe(true)
        expect(registry.isCommandSupported('relay', 'pulse')).toBe(true)
        expect(registry.isCommandSupported('relay', 'open')).toBe(false)
        expect(registry.isCommandSupported('contact-sensor', 'on')).toBe(false)
        expect(registry.isCommandSupported('dimmer', 'on')).toBe(false)
    })

    it('should skip directories without a manifest', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'device-types-'))
        try {
            await fs.mkdir(path.join(dir, 'empty'))
            await fs.mkdir(path.join(dir, 'siren'))
            await fs.writeFile(
                path.join(dir, 'siren', 'manifest.json'),
                JSON.stringify({
                    id: 'siren',
                    name: 'Siren',
                    version: '0.1.0',
                    role: 'actuator',
                    commands: [{ id: 'on', label: 'On' }],
                    states: ['on', 'off'],
                })
            )

            const custom = new DeviceTypeRegistry(dir)
            await custom.loadAll()

            expect(custom.getDeviceTypes()).toEqual(['siren'])
        } finally {
            await fs.rm(dir, { recursive: true, force: true })
        }
    })

    it('should reject an invalid manifest', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'device-types-'))
        try {
            await fs.mkdir(path.join(dir, 'broken'))
            await fs.writeFile(path.join(dir, 'broken', 'manifest.json'), JSON.stringify({ id: 'broken' }))

            await expect(new DeviceTypeRegistry(dir).loadAll()).rejects.toThrow('Failed to load manifest in broken')
        } finally {
            await fs.rm(dir, { recursive: true, force: true })
        }
    })
})
