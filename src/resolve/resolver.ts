/**
 * spectro-connect — Device Resolver
 *
 * Turns a device name into exactly one management address. Zero matches
 * and multiple matches are both failures; the resolver never picks among
 * candidates.
 */

import { ConnectError, isConnectError } from '../errors.js'
import type { DeviceApi, DeviceRecord, ResolutionResult } from './types.js'

export async function resolveDevice(name: string, api: DeviceApi): Promise<ResolutionResult> {
  let devices: DeviceRecord[]
  try {
    // Spectrum decides how names match; pass the name through as typed
    devices = await api.findDevicesByName(name)
  } catch (err) {
    if (isConnectError(err)) throw err
    throw new ConnectError(
      'UpstreamUnavailable',
      name,
      `Device lookup for "${name}" failed: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    )
  }

  if (devices.length === 0) {
    throw new ConnectError('NotFound', name, `No device with name "${name}" found`)
  }

  if (devices.length > 1) {
    const listing = [...devices]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((d) => `${d.name} (${d.ip})`)
      .join(', ')
    throw new ConnectError(
      'Ambiguous',
      name,
      `Multiple devices match "${name}": ${listing}`,
      { candidates: devices },
    )
  }

  const [device] = devices
  return { ip: device.ip, deviceClass: device.deviceClass, name: device.name }
}
