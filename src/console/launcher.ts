/**
 * spectro-connect — Console Launcher
 *
 * Picks the terminal client for the host OS and points it at the local
 * relay proxy:
 *   - Windows: PuTTY, with -loghost so its title and host key use the device IP
 *   - elsewhere (inc. WSL): telnet, or ssh with HostKeyAlias for the same reason
 */

import { spawn, type ChildProcess } from 'node:child_process'
import * as readline from 'node:readline/promises'
import type { Protocol } from '../config/types.js'

export type ConsoleSession = {
  protocol: Protocol
  /** Local proxy the client connects to */
  host: string
  port: number
  /** Real device address, used for host keys and window titles */
  deviceIp: string
  /** Required for ssh */
  username?: string
  /** Extra `-o` options for ssh */
  sshOptions?: string[]
}

export type ConsoleCommand = {
  command: string
  args: string[]
}

export function buildConsoleCommand(platform: NodeJS.Platform, session: ConsoleSession): ConsoleCommand {
  const { protocol, host, port, deviceIp } = session

  if (platform === 'win32') {
    return {
      command: 'putty.exe',
      args: [`-${protocol}`, host, '-P', String(port), '-loghost', deviceIp],
    }
  }

  if (protocol === 'telnet') {
    return { command: 'telnet', args: [host, String(port)] }
  }

  const args = ['-o', `HostKeyAlias=${deviceIp}`]
  for (const option of session.sshOptions ?? []) {
    args.push('-o', option)
  }
  const target = session.username ? `${session.username}@${host}` : host
  args.push(target, '-p', String(port))
  return { command: 'ssh', args }
}

/** Ask for the SSH username on the terminal */
export async function promptUsername(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<string> {
  const rl = readline.createInterface({ input, output, terminal: false })
  try {
    return (await rl.question('Username: ')).trim()
  } finally {
    rl.close()
  }
}

/** Spawn the console with the operator's terminal attached */
export function launchConsole(cmd: ConsoleCommand): ChildProcess {
  return spawn(cmd.command, cmd.args, { stdio: 'inherit' })
}
