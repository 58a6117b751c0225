/**
 * spectro-connect — Connection Planner
 *
 * token → classify → (ip | Spectrum lookup) → protocol + relay command.
 * Reads nothing from the environment; config and the API client are passed in.
 */

import type { AppConfig } from './config/types.js'
import { ConnectError } from './errors.js'
import { classify } from './resolve/classifier.js'
import { resolveDevice } from './resolve/resolver.js'
import type { DeviceApi, ResolutionResult } from './resolve/types.js'
import { selectAndEncode, type RelayConnectionSpec } from './relay/encoder.js'

export type ConnectRequest = {
  /** IPv4 address or Spectrum model name */
  target: string
  telnet?: boolean
  /** Overrides relay.host from config */
  relayHost?: string
  /** Overrides the protocol's default device port */
  port?: number
}

export type ConnectionPlan = {
  resolution: ResolutionResult
  spec: RelayConnectionSpec
}

export async function planConnection(
  request: ConnectRequest,
  config: AppConfig,
  api?: DeviceApi,
): Promise<ConnectionPlan> {
  const { target } = request

  let resolution: ResolutionResult
  if (classify(target) === 'ip') {
    resolution = { ip: target }
  } else {
    if (!api) {
      throw new ConnectError(
        'ApiClientUnavailable',
        target,
        `"${target}" is not an IPv4 address and Spectrum is not configured, so it can't be looked up`,
      )
    }
    resolution = await resolveDevice(target, api)
  }

  const spec = selectAndEncode(resolution, request.telnet ?? false, request.relayHost ?? config.relay.host, {
    classes: config.protocols.classes,
    ports: config.protocols.ports,
    relayPort: config.relay.port,
    devicePort: request.port,
  })

  return { resolution, spec }
}
