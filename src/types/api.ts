/**
 * API Response types - Types for API responses
 */

import type { DoorRequest, DoorStatus, GarageDoorDefinition } from '../modules/garage-doors/types'

export interface DoorResponse {
  definition: GarageDoorDefinition
  loaded: boolean           // false when disabled or rejected at load
  status: DoorStatus
  statusExtended: string | null
  updatedAt: Date | null
  pendingRequest: DoorRequest | null
}

export interface DeleteResponse {
  success: boolean
  message: string
}

export interface DeviceTypeListItem {
  id: string
  name: string
  version: string
  role: string
}

// Payload of the door:status socket event
export interface DoorStatusEvent {
  doorId: string
  name: string
  status: DoorStatus
  statusExtended: string | null
  updatedAt: Date | null
}
