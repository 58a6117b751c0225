/**
 * spectro-connect — Relay Encoder
 *
 * SpectroServer relays a TCP connection once it receives a single
 * `relay <ip> <port>\r\n` line on it. The same line is what the OneClick
 * console sends, so the format here is fixed.
 */

import type { Protocol } from '../config/types.js'
import { ConnectError } from '../errors.js'
import { isIPv4 } from '../resolve/classifier.js'
import type { ResolutionResult } from '../resolve/types.js'
import { selectProtocol, type ProtocolTable } from './protocol.js'

export type RelayConnectionSpec = {
  protocol: Protocol
  deviceIp: string
  devicePort: number
  relayHost: string
  relayPort: number
  /** Exact bytes to send to the relay server before any session data */
  command: string
}

export type EncodeOptions = {
  classes: ProtocolTable
  ports: Record<Protocol, number>
  relayPort: number
  /** Overrides the protocol's default device port */
  devicePort?: number
}

export function encodeRelayCommand(ip: string, port: number): string {
  return `relay ${ip} ${port}\r\n`
}

export function selectAndEncode(
  result: ResolutionResult,
  overrideTelnet: boolean,
  relayHost: string | undefined,
  options: EncodeOptions,
): RelayConnectionSpec {
  const host = relayHost?.trim() ?? ''
  if (!host) {
    throw new ConnectError(
      'MissingRelayHost',
      result.ip,
      `No SpectroServer host configured to reach ${result.ip}. Pass --spectro-ip or set SPECTROSERVER_HOST`,
    )
  }

  if (!isIPv4(result.ip)) {
    throw new ConnectError(
      'InvalidAddress',
      result.ip,
      `"${result.ip}" is not a valid IPv4 address${result.name ? ` (device ${result.name})` : ''}`,
    )
  }

  const protocol = selectProtocol(overrideTelnet, result.deviceClass, options.classes)
  const devicePort = options.devicePort ?? options.ports[protocol]

  return {
    protocol,
    deviceIp: result.ip,
    devicePort,
    relayHost: host,
    relayPort: options.relayPort,
    command: encodeRelayCommand(result.ip, devicePort),
  }
}
