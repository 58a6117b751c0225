/**
 * spectro-connect — Spectrum REST client
 *
 * Implements DeviceApi against the OneClick REST API. One POST per lookup,
 * bounded by a timeout. Every failure (network, auth, HTTP status,
 * unreadable body) surfaces as UpstreamUnavailable; nothing is retried.
 */

import type { SpectrumConfig } from '../config/types.js'
import { ConnectError } from '../errors.js'
import type { DeviceApi, DeviceRecord } from '../resolve/types.js'
import { buildModelSearchRequest } from './request.js'
import { parseModelResponse } from './response.js'

export type SpectrumClientOptions = {
  url: string
  username: string
  password: string
  timeoutMs: number
  fetch?: typeof fetch
}

// AbortSignal.timeout() rejects with a DOMException named TimeoutError
function isTimeout(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError'
}

export class SpectrumClient implements DeviceApi {
  private readonly endpoint: string
  private readonly authorization: string
  private readonly timeoutMs: number
  private readonly fetchImpl: typeof fetch

  constructor(options: SpectrumClientOptions) {
    this.endpoint = `${options.url.replace(/\/+$/, '')}/spectrum/restful/models`
    this.authorization = `Basic ${Buffer.from(`${options.username}:${options.password}`).toString('base64')}`
    this.timeoutMs = options.timeoutMs
    this.fetchImpl = options.fetch ?? fetch
  }

  async findDevicesByName(name: string): Promise<DeviceRecord[]> {
    const fail = (reason: string, cause?: unknown) =>
      new ConnectError('UpstreamUnavailable', name, `Spectrum lookup for "${name}" failed: ${reason}`, { cause })

    let response: Response
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/xml',
          Accept: 'application/xml',
          Authorization: this.authorization,
        },
        body: buildModelSearchRequest(name),
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (err) {
      if (isTimeout(err)) {
        throw fail(`no response within ${this.timeoutMs}ms`, err)
      }
      throw fail(err instanceof Error ? err.message : String(err), err)
    }

    if (!response.ok) {
      throw fail(`HTTP ${response.status}${response.status === 401 ? ' (check SPECTRUM_USERNAME / SPECTRUM_PASSWORD)' : ''}`)
    }

    try {
      return parseModelResponse(await response.text())
    } catch (err) {
      throw fail(err instanceof Error ? err.message : String(err), err)
    }
  }
}

/** Returns undefined unless url, username and password are all configured */
export function createSpectrumClient(
  config: SpectrumConfig,
  fetchImpl?: typeof fetch,
): SpectrumClient | undefined {
  const { url, username, password } = config
  if (!url || !username || !password) return undefined
  return new SpectrumClient({ url, username, password, timeoutMs: config.timeout_ms, fetch: fetchImpl })
}
