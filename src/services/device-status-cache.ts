export type DeviceStatus = "online" | "offline";

export type DeviceIdentity = {
  deviceId: string;
  deviceNumber: string;
  deviceName: string;
  description: string;
};

export type DeviceStatusEntry = DeviceIdentity & {
  status: DeviceStatus | null;
  updatedAt: string;
};

// Entries live until cleared or overwritten. Every method is synchronous, so a
// read-modify-write on one device number never interleaves with another call.
export class DeviceStatusCache {
  private readonly byDeviceNumber = new Map<string, DeviceStatusEntry>();
  private readonly byDeviceId = new Map<string, string>();

  remember(identity: DeviceIdentity): void {
    const existing = this.byDeviceNumber.get(identity.deviceNumber);
    if (existing && existing.deviceId && existing.deviceId !== identity.deviceId) {
      this.byDeviceId.delete(existing.deviceId);
    }

    const previousNumber = this.byDeviceId.get(identity.deviceId);
    if (previousNumber !== undefined && previousNumber !== identity.deviceNumber) {
      this.byDeviceNumber.delete(previousNumber);
    }

    this.byDeviceNumber.set(identity.deviceNumber, {
      ...identity,
      status: existing?.status ?? null,
      updatedAt: new Date().toISOString()
    });
    if (identity.deviceId) {
      this.byDeviceId.set(identity.deviceId, identity.deviceNumber);
    }
  }

  setStatus(deviceNumber: string, status: DeviceStatus): void {
    const existing = this.byDeviceNumber.get(deviceNumber);
    this.byDeviceNumber.set(deviceNumber, {
      deviceId: existing?.deviceId ?? "",
      deviceNumber,
      deviceName: existing?.deviceName ?? "",
      description: existing?.description ?? "",
      status,
      updatedAt: new Date().toISOString()
    });
  }

  getById(deviceId: string): DeviceIdentity | null {
    const deviceNumber = this.byDeviceId.get(deviceId);
    if (deviceNumber === undefined) {
      return null;
    }
    const entry = this.byDeviceNumber.get(deviceNumber);
    if (!entry) {
      return null;
    }
    return {
      deviceId: entry.deviceId,
      deviceNumber: entry.deviceNumber,
      deviceName: entry.deviceName,
      description: entry.description
    };
  }

  getByNumber(deviceNumber: string): DeviceStatusEntry | null {
    const entry = this.byDeviceNumber.get(deviceNumber);
    return entry ? { ...entry } : null;
  }

  clearByNumber(deviceNumber: string): void {
    const entry = this.byDeviceNumber.get(deviceNumber);
    if (!entry) {
      return;
    }
    this.byDeviceNumber.delete(deviceNumber);
    if (entry.deviceId && this.byDeviceId.get(entry.deviceId) === deviceNumber) {
      this.byDeviceId.delete(entry.deviceId);
    }
  }

  size(): number {
    return this.byDeviceNumber.size;
  }
}

export const deviceStatusCache = new DeviceStatusCache();
