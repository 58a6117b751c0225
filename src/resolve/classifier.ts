/**
 * spectro-connect — Address Classifier
 *
 * Decides whether the operator typed an IPv4 address or a device name.
 * Purely syntactic: no DNS, no reachability checks.
 */

import { ConnectError } from '../errors.js'

export type TokenKind = 'ip' | 'name'

const OCTET = /^\d{1,3}$/

/** Four dot-separated decimal octets in 0–255 and nothing else */
export function isIPv4(value: string): boolean {
  const octets = value.split('.')
  if (octets.length !== 4) return false
  return octets.every((o) => OCTET.test(o) && Number(o) <= 255)
}

export function classify(token: string): TokenKind {
  if (token.length === 0) {
    throw new ConnectError('InvalidInput', token, 'Target must not be empty')
  }
  return isIPv4(token) ? 'ip' : 'name'
}
