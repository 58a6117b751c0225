import { describe, it, expect, afterEach } from 'vitest'
import * as net from 'node:net'
import { Logger } from '../log/logger.js'
import { startRelayProxy } from './proxy.js'
import type { RelayConnectionSpec } from './encoder.js'

function listen(server: net.Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address()
      resolve(typeof address === 'object' && address !== null ? address.port : 0)
    })
  })
}

function specFor(relayPort: number): RelayConnectionSpec {
  return {
    protocol: 'ssh',
    deviceIp: '10.0.0.5',
    devicePort: 22,
    relayHost: '127.0.0.1',
    relayPort,
    command: 'relay 10.0.0.5 22\r\n',
  }
}

describe('startRelayProxy', () => {
  const servers: net.Server[] = []

  afterEach(async () => {
    await Promise.all(servers.splice(0).map((s) => new Promise<void>((resolve) => s.close(() => resolve()))))
  })

  it('sends the relay command first and then relays client bytes', async () => {
    // Stand-in SpectroServer: echoes everything it receives
    const relay = net.createServer((sock) => sock.pipe(sock))
    servers.push(relay)
    const relayPort = await listen(relay)

    const proxy = await startRelayProxy(specFor(relayPort))
    expect(proxy.host).toBe('127.0.0.1')
    expect(proxy.port).toBeGreaterThan(0)

    const expected = 'relay 10.0.0.5 22\r\nping'
    const received = await new Promise<string>((resolve, reject) => {
      let data = ''
      const client = net.connect(proxy.port, proxy.host, () => client.write('ping'))
      client.on('data', (chunk) => {
        data += chunk.toString('ascii')
        if (data.length >= expected.length) client.end()
      })
      client.on('close', () => resolve(data))
      client.on('error', reject)
    })

    expect(received).toBe(expected)
    expect(await proxy.closed).toBeUndefined()
  })

  it('warns and closes with the error when the relay server is unreachable', async () => {
    const gone = net.createServer()
    const deadPort = await listen(gone)
    await new Promise<void>((resolve) => gone.close(() => resolve()))

    const lines: string[] = []
    const logger = new Logger({ color: false, write: (line) => lines.push(line) })
    const proxy = await startRelayProxy(specFor(deadPort), { logger })

    await new Promise<void>((resolve) => {
      const client = net.connect(proxy.port, proxy.host)
      client.on('error', () => {})
      client.on('close', () => resolve())
    })

    const failure = await proxy.closed
    expect(failure).toBeInstanceOf(Error)
    expect(failure).toMatchObject({ code: 'ECONNREFUSED' })
    expect(lines).toEqual([
      `[+] Connecting to host [10.0.0.5:22] through SpectroServer [127.0.0.1:${deadPort}]`,
      `[-] Could not reach SpectroServer [127.0.0.1:${deadPort}]: ${failure?.message}`,
    ])
  })

  it('can be closed before anyone connects', async () => {
    const proxy = await startRelayProxy(specFor(1))
    proxy.close()
    expect(await proxy.closed).toBeUndefined()
  })

  it('binds the requested local port', async () => {
    const spare = net.createServer()
    const port = await listen(spare)
    await new Promise<void>((resolve) => spare.close(() => resolve()))

    const proxy = await startRelayProxy(specFor(1), { localPort: port })
    expect(proxy.port).toBe(port)
    proxy.close()
    await proxy.closed
  })
})
