import type { DeviceGateway, DeviceState, PublishCommand } from './types'

/**
 * Last known status of every device seen on the bus
 */
export class DeviceStateStore {
    private states = new Map<string, DeviceState>()

    /**
     * Store a status. Returns true when status or extended status changed.
     */
    update(state: DeviceState): boolean {
        const previous = this.states.get(state.deviceId)
        this.states.set(state.deviceId, state)

        return (
            !previous ||
            previous.status !== state.status ||
            previous.statusExtended !== state.statusExtended
        )
    }

    get(deviceId: string): DeviceState | undefined {
        return this.states.get(deviceId)
    }

    list(): DeviceState[] {
        return Array.from(this.states.values()).sort((a, b) => a.deviceId.localeCompare(b.deviceId))
    }

    clear(): void {
        this.states.clear()
    }
}

export class MqttDeviceGateway implements DeviceGateway {
    constructor(
        private store: DeviceStateStore,
        private publish: PublishCommand
    ) {}

    getStatus(deviceId: string): DeviceState | undefined {
        return this.store.get(deviceId)
    }

    sendCommand(deviceId: string, command: string, requestId: string): boolean {
        return this.publish(deviceId, command, requestId)
    }
}
