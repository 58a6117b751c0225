/**
 * spectro-connect — Theme
 *
 * ANSI 256-colour palette for terminal output.
 */

const ESC = '\x1b['

export const RESET = `${ESC}0m`

// 256-color foreground
export const fg = (code: number) => `${ESC}38;5;${code}m`

export const C = {
  dim:     fg(244),  // medium gray, debug output
  host:    fg(117),  // sky blue, addresses and ports
  success: fg(42),   // green
  warning: fg(214),  // amber
} as const

/** Strip ANSI sequences before writing to a log file */
export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, '')
}

export function paint(color: string, text: string, enabled = true): string {
  return enabled ? `${color}${text}${RESET}` : text
}
