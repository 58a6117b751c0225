/**
 * spectro-connect — Config Defaults
 */

import type { AppConfig } from './types.js'

export const DEFAULT_CONFIG: AppConfig = {
  spectrum: {
    timeout_ms: 10_000,
  },
  relay: {
    port: 31415,
  },
  protocols: {
    classes: {
      '8519702': 'telnet',
    },
    ports: {
      ssh: 22,
      telnet: 23,
    },
  },
  ssh: {
    // Older device images only speak these
    options: [
      'KexAlgorithms=+diffie-hellman-group1-sha1,diffie-hellman-group-exchange-sha1',
      'Ciphers=+aes256-cbc',
    ],
  },
}
