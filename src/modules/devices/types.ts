export interface DeviceState {
    deviceId: string
    status: string
    statusExtended: string | null
    updatedAt: Date
}

/**
 * Read/command access to the devices on the bus.
 * Door logic only talks to devices through this interface.
 */
export interface DeviceGateway {
    getStatus(deviceId: string): DeviceState | undefined
    sendCommand(deviceId: string, command: string, requestId: string): boolean
}

export type PublishCommand = (deviceId: string, command: string, requestId: string) => boolean
