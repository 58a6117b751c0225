/**
 * spectro-connect — Local Relay Proxy
 *
 * Listens on 127.0.0.1 and accepts a single client. For that client it
 * opens a connection to SpectroServer, sends the relay command, then copies
 * bytes in both directions until either side goes away.
 */

import * as net from 'node:net'
import type { Logger } from '../log/logger.js'
import type { RelayConnectionSpec } from './encoder.js'

const LOCALHOST = '127.0.0.1'

/** How long a half-closed side gets to flush before it is destroyed */
const DRAIN_MS = 1000

export type RelayProxy = {
  host: string
  port: number
  /**
   * Resolves once the relayed session (or an unused proxy) has shut down,
   * with the error if SpectroServer could not be reached
   */
  closed: Promise<Error | undefined>
  close(): void
}

export type RelayProxyOptions = {
  localPort?: number
  logger?: Logger
}

export async function startRelayProxy(
  spec: RelayConnectionSpec,
  options: RelayProxyOptions = {},
): Promise<RelayProxy> {
  const { logger } = options
  const server = net.createServer()
  const sockets = new Set<net.Socket>()

  let failure: Error | undefined
  let finish: (failure: Error | undefined) => void = () => {}
  const closed = new Promise<Error | undefined>((resolve) => {
    finish = resolve
  })

  let serverClosing = false
  let serverClosed = false
  const closeServer = () => {
    if (serverClosing) return
    serverClosing = true
    server.close()
  }

  const maybeFinish = () => {
    if (serverClosed && sockets.size === 0) {
      logger?.debug('[+] Proxy shut down')
      finish(failure)
    }
  }

  server.on('close', () => {
    serverClosed = true
    maybeFinish()
  })

  let shuttingDown = false
  const shutdown = () => {
    if (shuttingDown) return
    shuttingDown = true
    logger?.debug('[+] Releasing resources...')
    closeServer()
    for (const socket of sockets) {
      socket.end()
      setTimeout(() => socket.destroy(), DRAIN_MS).unref()
    }
  }

  const track = (socket: net.Socket, label: string) => {
    sockets.add(socket)
    socket.on('error', (err) => {
      logger?.debug(`[-] ${label} socket error: ${err.message}`)
    })
    socket.on('close', () => {
      sockets.delete(socket)
      logger?.debug(`[+] ${label} connection closed`)
      shutdown()
      maybeFinish()
    })
  }

  server.on('connection', (client) => {
    if (serverClosing) {
      client.destroy()
      return
    }
    // One session per proxy
    closeServer()
    logger?.debug(`[+] Connection from [${client.remoteAddress}:${client.remotePort}]`)
    track(client, 'Client')

    logger?.info(
      `[+] Connecting to host [${spec.deviceIp}:${spec.devicePort}] ` +
        `through SpectroServer [${spec.relayHost}:${spec.relayPort}]`,
    )
    const remote = net.connect({ host: spec.relayHost, port: spec.relayPort })
    let tunnelled = false
    remote.once('connect', () => {
      tunnelled = true
      logger?.debug('[+] Tunnel connected, transferring data...')
    })
    remote.on('error', (err) => {
      if (tunnelled || failure) return
      failure = err
      logger?.warn(`[-] Could not reach SpectroServer [${spec.relayHost}:${spec.relayPort}]: ${err.message}`)
    })
    track(remote, 'Relay')

    // Queued ahead of anything piped from the client
    remote.write(spec.command, 'ascii')

    client.pipe(remote)
    remote.pipe(client)
  })

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject)
    server.listen(options.localPort ?? 0, LOCALHOST, () => {
      server.off('error', reject)
      resolve()
    })
  })

  server.on('error', (err) => {
    logger?.warn(`[-] Proxy error: ${err.message}`)
    if (!failure) failure = err
    shutdown()
  })

  const address = server.address()
  const port = typeof address === 'object' && address !== null ? address.port : 0
  logger?.debug(`[+] Listening on [${LOCALHOST}:${port}]`)

  return { host: LOCALHOST, port, closed, close: shutdown }
}
