/**
 * spectro-connect — Errors
 *
 * Every failure the connect flow can hit is a ConnectError tagged with a
 * kind. None of them are retried; the CLI prints one line and exits 1.
 */

import type { DeviceRecord } from './resolve/types.js'

export type ConnectErrorKind =
  | 'InvalidInput'
  | 'NotFound'
  | 'Ambiguous'
  | 'UpstreamUnavailable'
  | 'ApiClientUnavailable'
  | 'MissingRelayHost'
  | 'InvalidAddress'

export type ConnectErrorOptions = {
  cause?: unknown
  /** Devices that matched an ambiguous lookup */
  candidates?: DeviceRecord[]
}

export class ConnectError extends Error {
  readonly kind: ConnectErrorKind
  /** The token, name or address that caused the failure */
  readonly input: string
  readonly candidates: DeviceRecord[]

  constructor(kind: ConnectErrorKind, input: string, message: string, options: ConnectErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.name = 'ConnectError'
    this.kind = kind
    this.input = input
    this.candidates = options.candidates ?? []
  }
}

export function isConnectError(err: unknown): err is ConnectError {
  return err instanceof ConnectError
}

/** Single-line rendering for the terminal */
export function formatError(err: ConnectError): string {
  return `Error [${err.kind}]: ${err.message}`
}
