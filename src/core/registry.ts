/**
 * Device Type Registry
 *
 * Loads and provides access to device type manifests.
 * Manifests define the commands each device type accepts.
 */
import { DeviceTypeManifestSchema, type DeviceTypeManifest } from './types/device-type'
import fs from 'fs/promises'
import path from 'path'

// ============================================================================
// Registry Class
// ============================================================================

export class DeviceTypeRegistry {
  private manifests = new Map<string, DeviceTypeManifest>()
  private loaded = false

  constructor(private readonly typesDir: string = path.join(__dirname, '../device-types')) {}

  /**
   * Load all manifests from the device types directory
   */
  async loadAll(): Promise<void> {
    if (this.loaded) return

    const dirs = await fs.readdir(this.typesDir)

    for (const dir of dirs) {
      const manifestPath = path.join(this.typesDir, dir, 'manifest.json')
      try {
        const content = await fs.readFile(manifestPath, 'utf-8')
        const manifest = DeviceTypeManifestSchema.parse(JSON.parse(content))
        this.manifests.set(manifest.id, manifest)
      } catch (e) {
        // A directory without a manifest is not a device type
        if (!isMissingFile(e)) {
          throw new Error(`Failed to load manifest in ${dir}: ${e instanceof Error ? e.message : String(e)}`)
        }
      }
    }

    this.loaded = true
  }

  getManifest(deviceType: string): DeviceTypeManifest | undefined {
    return this.manifests.get(deviceType)
  }

  getAllManifests(): DeviceTypeManifest[] {
    return Array.from(this.manifests.values())
  }

  getDeviceTypes(): string[] {
    return Array.from(this.manifests.keys())
  }

  /**
   * Whether a device type accepts a command. Unknown types accept nothing.
   */
  isCommandSupported(deviceType: string, command: string): boolean {
    const manifest = this.manifests.get(deviceType)
    if (!manifest) return false
    return manifest.commands.some(c => c.id === command)
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')
}

// ============================================================================
// Singleton Export
// ============================================================================

export const registry = new DeviceTypeRegistry()
