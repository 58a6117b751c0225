/**
 * spectro-connect — Config Types
 */

export type Protocol = 'ssh' | 'telnet'

export type SpectrumConfig = {
  url?: string
  username?: string
  password?: string
  timeout_ms: number
}

export type RelayConfig = {
  host?: string
  port: number
}

export type ProtocolConfig = {
  /** NCM device family → protocol. Families not listed use SSH. */
  classes: Record<string, Protocol>
  ports: Record<Protocol, number>
}

export type SshConfig = {
  options: string[]
}

export type AppConfig = {
  spectrum: SpectrumConfig
  relay: RelayConfig
  protocols: ProtocolConfig
  ssh: SshConfig
  log?: boolean
}
