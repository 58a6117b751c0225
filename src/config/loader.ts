/**
 * spectro-connect — Config Loader
 *
 * Loads config.yaml from the app home, merges it over the defaults, then
 * applies the SPECTRUM_* / SPECTROSERVER_* environment variables on top.
 * Falls back to defaults if the file doesn't exist.
 */

import { readFileSync, existsSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { parse as parseYaml } from 'yaml'
import { DEFAULT_CONFIG } from './defaults.js'
import type { AppConfig, Protocol } from './types.js'

/** %APPDATA%\spectro-connect on Windows, ~/.spectro-connect elsewhere */
export const APP_DIR = process.platform === 'win32'
  ? join(process.env.APPDATA || join(homedir(), 'AppData', 'Roaming'), 'spectro-connect')
  : join(homedir(), '.spectro-connect')

export const CONFIG_PATH = join(APP_DIR, 'config.yaml')

/** Where `log: true` writes debug-YYYY-MM-DD.log */
export const LOGS_DIR = join(APP_DIR, 'logs')

export type LoadConfigOptions = {
  path?: string
  env?: NodeJS.ProcessEnv
  /** Called when the file exists but can't be used */
  onWarning?: (message: string) => void
}

type Dict = Record<string, unknown>

function isDict(val: unknown): val is Dict {
  return typeof val === 'object' && val !== null && !Array.isArray(val)
}

function isProtocol(val: unknown): val is Protocol {
  return val === 'ssh' || val === 'telnet'
}

function str(val: unknown): string | undefined {
  if (typeof val === 'string') return val
  if (typeof val === 'number') return String(val)
  return undefined
}

function num(val: unknown): number | undefined {
  if (typeof val === 'number' && Number.isFinite(val)) return val
  if (typeof val === 'string' && /^\d+$/.test(val.trim())) return Number(val.trim())
  return undefined
}

function section(raw: Dict, key: string): Dict {
  const val = raw[key]
  return isDict(val) ? val : {}
}

/** Merge a parsed YAML document over `base` (file wins, unknown keys ignored) */
export function mergeConfig(base: AppConfig, raw: unknown): AppConfig {
  if (!isDict(raw)) return base

  const spectrum = section(raw, 'spectrum')
  const relay = section(raw, 'relay')
  const protocols = section(raw, 'protocols')
  const ssh = section(raw, 'ssh')

  const classes = { ...base.protocols.classes }
  for (const [family, protocol] of Object.entries(section(protocols, 'classes'))) {
    if (isProtocol(protocol)) classes[family] = protocol
  }

  const ports = section(protocols, 'ports')
  const sshOptions = Array.isArray(ssh.options)
    ? ssh.options.filter((o): o is string => typeof o === 'string')
    : base.ssh.options

  return {
    spectrum: {
      url: str(spectrum.url) ?? base.spectrum.url,
      username: str(spectrum.username) ?? base.spectrum.username,
      password: str(spectrum.password) ?? base.spectrum.password,
      timeout_ms: num(spectrum.timeout_ms) ?? base.spectrum.timeout_ms,
    },
    relay: {
      host: str(relay.host) ?? base.relay.host,
      port: num(relay.port) ?? base.relay.port,
    },
    protocols: {
      classes,
      ports: {
        ssh: num(ports.ssh) ?? base.protocols.ports.ssh,
        telnet: num(ports.telnet) ?? base.protocols.ports.telnet,
      },
    },
    ssh: { options: sshOptions },
    log: typeof raw.log === 'boolean' ? raw.log : base.log,
  }
}

/** Environment variables override whatever the file says */
export function applyEnv(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  return {
    ...config,
    spectrum: {
      ...config.spectrum,
      url: env.SPECTRUM_URL || config.spectrum.url,
      username: env.SPECTRUM_USERNAME || config.spectrum.username,
      password: env.SPECTRUM_PASSWORD || config.spectrum.password,
    },
    relay: {
      host: env.SPECTROSERVER_HOST || config.relay.host,
      port: num(env.SPECTROSERVER_PORT) ?? config.relay.port,
    },
  }
}

/** Load config from APP_DIR (or `options.path`), merged with defaults and env */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const path = options.path ?? CONFIG_PATH
  const env = options.env ?? process.env

  let config = DEFAULT_CONFIG
  if (existsSync(path)) {
    try {
      const raw = readFileSync(path, 'utf-8')
      config = mergeConfig(DEFAULT_CONFIG, parseYaml(raw))
    } catch (err) {
      options.onWarning?.(
        `Ignoring ${path}: ${err instanceof Error ? err.message : String(err)}`,
      )
    }
  }

  return applyEnv(config, env)
}
