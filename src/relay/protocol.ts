/**
 * spectro-connect — Protocol Selector
 *
 * First matching rule wins:
 *   1. --telnet was given           → telnet
 *   2. device family is in the table → whatever the table says
 *   3. anything else                 → ssh
 */

import type { Protocol } from '../config/types.js'

export type ProtocolTable = Record<string, Protocol>

export function selectProtocol(
  overrideTelnet: boolean,
  deviceClass: string | undefined,
  table: ProtocolTable,
): Protocol {
  if (overrideTelnet) return 'telnet'
  if (deviceClass !== undefined && Object.hasOwn(table, deviceClass)) {
    return table[deviceClass]
  }
  return 'ssh'
}
