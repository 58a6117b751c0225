/**
 * spectro-connect — Resolution Types
 */

/** One manager inventory entry matched by a name query */
export type DeviceRecord = {
  name: string
  ip: string
  /** NCM device family; absent when Spectrum has none on record */
  deviceClass?: string
}

export type ResolutionResult = {
  ip: string
  deviceClass?: string
  /** Set when the address came from a manager lookup */
  name?: string
}

/** What the resolver needs from the manager */
export interface DeviceApi {
  findDevicesByName(name: string): Promise<DeviceRecord[]>
}
