/**
 * spectro-connect — Logger
 *
 * Leveled console output on stderr. With `log: true` in config every line
 * also goes to a dated file under the app home's logs/ directory.
 */

import { mkdirSync, appendFileSync } from 'node:fs'
import { join } from 'node:path'
import { C, paint, stripAnsi } from '../ui/theme.js'

export type LogLevel = 'debug' | 'info' | 'warn'

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30 }

export type LoggerOptions = {
  level?: LogLevel
  /** Directory for debug-YYYY-MM-DD.log; no file logging when unset */
  logDir?: string
  color?: boolean
  write?: (line: string) => void
}

export class Logger {
  private readonly level: number
  private readonly logDir?: string
  private readonly color: boolean
  private readonly write: (line: string) => void

  constructor(options: LoggerOptions = {}) {
    this.level = LEVELS[options.level ?? 'info']
    this.logDir = options.logDir
    this.color = options.color ?? (process.stderr.isTTY ?? false)
    this.write = options.write ?? ((line) => process.stderr.write(`${line}\n`))
  }

  debug(message: string): void {
    this.log('debug', paint(C.dim, message, this.color))
  }

  info(message: string): void {
    this.log('info', message)
  }

  warn(message: string): void {
    this.log('warn', paint(C.warning, message, this.color))
  }

  /** Wrap a value (address, host name) in the highlight colour */
  highlight(text: string, color: string = C.host): string {
    return paint(color, text, this.color)
  }

  private log(level: LogLevel, line: string): void {
    if (this.logDir) this.append(this.logDir, level, line)
    if (LEVELS[level] < this.level) return
    this.write(line)
  }

  private append(dir: string, level: LogLevel, line: string): void {
    mkdirSync(dir, { recursive: true })
    const now = new Date()
    const file = join(dir, `debug-${now.toISOString().slice(0, 10)}.log`)
    appendFileSync(file, `[${now.toISOString()}] ${level.toUpperCase().padEnd(5)} ${stripAnsi(line)}\n`, 'utf-8')
  }
}
