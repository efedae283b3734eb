/**
 * Core types for device type manifests.
 * A manifest describes the commands a device accepts and the states it reports.
 */
import { z } from 'zod'

// ============================================================================
// Device Type Manifest
// ============================================================================

export interface DeviceTypeManifest {
  id: string              // "relay", "contact-sensor", etc.
  name: string            // "Relay"
  version: string         // "1.0.0"
  role: DeviceRole
  commands: CommandDef[]
  states: string[]        // ["on", "off"]
}

export type DeviceRole = 'sensor' | 'actuator' | 'virtual'

// ============================================================================
// Command Definition
// ============================================================================

export interface CommandDef {
  id: string              // "on", "pulse", "open"
  label: string           // "Pulse"
}

// ============================================================================
// Validation
// ============================================================================

export const CommandDefSchema = z.object({
  id: z.string().min(1),
  label: z.string(),
})

export const DeviceTypeManifestSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  version: z.string(),
  role: z.enum(['sensor', 'actuator', 'virtual']),
  commands: z.array(CommandDefSchema),
  states: z.array(z.string()),
}) satisfies z.ZodType<DeviceTypeManifest>
