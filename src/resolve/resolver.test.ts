import { describe, it, expect, vi } from 'vitest'
import { resolveDevice } from './resolver.js'
import type { DeviceApi, DeviceRecord } from './types.js'
import { ConnectError } from '../errors.js'

function stubApi(devices: DeviceRecord[]): DeviceApi {
  return { findDevicesByName: vi.fn(async () => devices) }
}

describe('resolveDevice', () => {
  it('returns the only match', async () => {
    const api = stubApi([{ name: 'CORE_RTR01', ip: '10.0.0.5', deviceClass: '8519702' }])

    await expect(resolveDevice('CORE_RTR01', api)).resolves.toEqual({
      ip: '10.0.0.5',
      deviceClass: '8519702',
      name: 'CORE_RTR01',
    })
  })

  it('keeps an unknown class as undefined', async () => {
    const result = await resolveDevice('edge', stubApi([{ name: 'EDGE_SW01', ip: '10.1.1.1' }]))
    expect(result.deviceClass).toBeUndefined()
    expect(result.ip).toBe('10.1.1.1')
  })

  it('passes the name through unmodified', async () => {
    const api = stubApi([{ name: 'Core_Rtr01', ip: '10.0.0.5' }])
    await resolveDevice('  core_RTR01', api)
    expect(api.findDevicesByName).toHaveBeenCalledWith('  core_RTR01')
  })

  it('fails with NotFound when nothing matches', async () => {
    await expect(resolveDevice('NOPE', stubApi([]))).rejects.toMatchObject({
      kind: 'NotFound',
      input: 'NOPE',
      message: 'No device with name "NOPE" found',
    })
  })

  it('fails with Ambiguous on two matches, even when one is an exact name', async () => {
    const devices = [
      { name: 'CORE_RTR01B', ip: '10.0.0.6' },
      { name: 'CORE_RTR01', ip: '10.0.0.5', deviceClass: '8519702' },
    ]

    const err = await resolveDevice('CORE_RTR01', stubApi(devices)).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ConnectError)
    expect(err).toMatchObject({
      kind: 'Ambiguous',
      input: 'CORE_RTR01',
      message: 'Multiple devices match "CORE_RTR01": CORE_RTR01 (10.0.0.5), CORE_RTR01B (10.0.0.6)',
      candidates: devices,
    })
  })

  it('wraps API failures as UpstreamUnavailable', async () => {
    const api: DeviceApi = {
      findDevicesByName: async () => {
        throw new Error('connect ECONNREFUSED 192.0.2.10:443')
      },
    }

    await expect(resolveDevice('CORE_RTR01', api)).rejects.toMatchObject({
      kind: 'UpstreamUnavailable',
      message: 'Device lookup for "CORE_RTR01" failed: connect ECONNREFUSED 192.0.2.10:443',
    })
  })

  it('lets ConnectErrors from the API through as they are', async () => {
    const original = new ConnectError('UpstreamUnavailable', 'X', 'Spectrum lookup for "X" failed: HTTP 401')
    const api: DeviceApi = {
      findDevicesByName: async () => {
        throw original
      },
    }

    await expect(resolveDevice('X', api)).rejects.toBe(original)
  })
})
