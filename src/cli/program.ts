/**
 * spectro-connect — CLI program
 *
 * Parses arguments, plans the connection, starts the local relay proxy and
 * hands it to a terminal client (or just prints it with --proxy).
 * Everything with side effects comes in through CliDeps so the whole flow
 * runs in tests without sockets or child processes.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander'
import type { AppConfig } from '../config/types.js'
import { LOGS_DIR, loadConfig } from '../config/loader.js'
import { planConnection } from '../connect.js'
import { buildConsoleCommand, launchConsole, promptUsername, type ConsoleCommand } from '../console/launcher.js'
import { formatError, isConnectError } from '../errors.js'
import { Logger } from '../log/logger.js'
import type { RelayConnectionSpec } from '../relay/encoder.js'
import { startRelayProxy, type RelayProxy, type RelayProxyOptions } from '../relay/proxy.js'
import type { DeviceApi } from '../resolve/types.js'
import { createSpectrumClient } from '../spectrum/client.js'
import { C } from '../ui/theme.js'

export const VERSION = '0.1.0'

/** The bits of a spawned console the CLI listens to */
export interface ConsoleProcess {
  once(event: 'exit', listener: (code: number | null) => void): unknown
  once(event: 'error', listener: (err: Error) => void): unknown
}

export type CliDeps = {
  loadConfig: (onWarning: (message: string) => void) => AppConfig
  createApi: (config: AppConfig) => DeviceApi | undefined
  startProxy: (spec: RelayConnectionSpec, options: RelayProxyOptions) => Promise<RelayProxy>
  launch: (cmd: ConsoleCommand) => ConsoleProcess
  promptUsername: () => Promise<string>
  platform: NodeJS.Platform
  stdout: (text: string) => void
  stderr: (text: string) => void
  color: boolean
}

export type CliOptions = {
  spectroIp?: string
  port?: number
  localPort: number
  proxy?: boolean
  telnet?: boolean
  user?: string
  verbose?: boolean
}

export function defaultDeps(): CliDeps {
  return {
    loadConfig: (onWarning) => loadConfig({ onWarning }),
    createApi: (config) => createSpectrumClient(config.spectrum),
    startProxy: startRelayProxy,
    launch: launchConsole,
    promptUsername: () => promptUsername(),
    platform: process.platform,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    color: process.stderr.isTTY ?? false,
  }
}

function portParser(min: number) {
  return (value: string): number => {
    const port = /^\d+$/.test(value) ? Number(value) : NaN
    if (!Number.isInteger(port) || port < min || port > 65535) {
      throw new InvalidArgumentError(`${value} is not a valid port (${min}-65535).`)
    }
    return port
  }
}

/** Plan, proxy, launch. Returns the process exit code. */
export async function runConnect(host: string, options: CliOptions, deps: CliDeps): Promise<number> {
  const warnings: string[] = []
  const config = deps.loadConfig((message) => warnings.push(message))

  const logger = new Logger({
    level: options.verbose ? 'debug' : 'info',
    logDir: config.log ? LOGS_DIR : undefined,
    color: deps.color,
    write: (line) => deps.stderr(`${line}\n`),
  })
  warnings.forEach((w) => logger.warn(w))

  try {
    const { resolution, spec } = await planConnection(
      { target: host, telnet: options.telnet, relayHost: options.spectroIp, port: options.port },
      config,
      deps.createApi(config),
    )

    if (resolution.name) {
      logger.info(`[+] Found device ${logger.highlight(resolution.name, C.success)}`)
    }
    logger.debug(`[+] Using ${spec.protocol} to ${spec.deviceIp}:${spec.devicePort}`)

    const needsUser = !options.proxy && spec.protocol === 'ssh' && deps.platform !== 'win32'
    const username = needsUser ? (options.user ?? (await deps.promptUsername())) : options.user

    const proxy = await deps.startProxy(spec, { localPort: options.localPort, logger })
    logger.debug(`[+] Created server socket on [${proxy.host}:${proxy.port}]`)

    if (options.proxy) {
      logger.info(
        `[+] Proxy socket details: ${logger.highlight(`${proxy.host}:${proxy.port}`)}. Awaiting connection...`,
      )
      return (await proxy.closed) ? 1 : 0
    }

    const cmd = buildConsoleCommand(deps.platform, {
      protocol: spec.protocol,
      host: proxy.host,
      port: proxy.port,
      deviceIp: spec.deviceIp,
      username,
      sshOptions: config.ssh.options,
    })
    logger.debug(`[+] Starting session with [${cmd.command} ${cmd.args.join(' ')}]`)

    let exitCode = 0
    const child = deps.launch(cmd)
    child.once('error', (err) => {
      logger.warn(`[-] Could not start ${cmd.command}: ${err.message}`)
      exitCode = 1
      proxy.close()
    })
    // A console that exits before (or after) connecting leaves nothing to relay
    child.once('exit', () => proxy.close())

    const failure = await proxy.closed
    return failure ? 1 : exitCode
  } catch (err) {
    if (isConnectError(err)) {
      deps.stderr(`${formatError(err)}\n`)
      return 1
    }
    throw err
  }
}

export function createProgram(deps: CliDeps, onResult: (code: number) => void): Command {
  const program = new Command()

  program
    .name('spectro-connect')
    .description('Connect to a Spectrum-managed device through SpectroServer')
    .version(VERSION, '-V, --version', 'Output the version number')
    .argument('<host>', 'IP address or Spectrum model name of the device')
    .option('-s, --spectro-ip <host>', 'SpectroServer host (default: SPECTROSERVER_HOST)')
    .option('-p, --port <port>', 'Port to connect to on the device', portParser(1))
    .option('-l, --local-port <port>', 'Local port for the proxy socket', portParser(0), 0)
    .option('-x, --proxy', 'Only provide a local proxy socket')
    .option('-t, --telnet', 'Connect using Telnet')
    .option('-u, --user <name>', 'SSH username (prompted for if omitted)')
    .option('-v, --verbose', 'Verbose output')
    .addHelpText(
      'after',
      `
Examples:
  $ spectro-connect 172.31.100.20             SSH to an address
  $ spectro-connect 172.31.100.20 --telnet    Telnet to an address
  $ spectro-connect CORE_RTR01                Look up a device in Spectrum
  $ spectro-connect CORE_RTR01 -x -l 2222     Proxy only, on 127.0.0.1:2222
`,
    )
    .exitOverride()
    .configureOutput({
      writeOut: deps.stdout,
      writeErr: deps.stderr,
    })
    .action(async (host: string) => {
      onResult(await runConnect(host, program.opts<CliOptions>(), deps))
    })

  return program
}

/** Run the CLI against `argv` (without node and script path) */
export async function runCli(argv: string[], deps: CliDeps = defaultDeps()): Promise<number> {
  let code = 0
  const program = createProgram(deps, (result) => {
    code = result
  })

  try {
    await program.parseAsync(argv, { from: 'user' })
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode
    throw err
  }
  return code
}
