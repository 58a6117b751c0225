import { describe, it, expect } from 'vitest'
import { encodeRelayCommand, selectAndEncode, type EncodeOptions } from './encoder.js'
import { selectProtocol } from './protocol.js'

const TELNET_FAMILY = '8519702'

function thrown(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('expected a throw')
}

const options: EncodeOptions = {
  classes: { [TELNET_FAMILY]: 'telnet', '1234': 'ssh' },
  ports: { ssh: 22, telnet: 23 },
  relayPort: 31415,
}

describe('selectProtocol', () => {
  it('always picks telnet when overridden', () => {
    expect(selectProtocol(true, undefined, options.classes)).toBe('telnet')
    expect(selectProtocol(true, '1234', options.classes)).toBe('telnet')
    expect(selectProtocol(true, 'anything', {})).toBe('telnet')
  })

  it('follows the class table', () => {
    expect(selectProtocol(false, TELNET_FAMILY, options.classes)).toBe('telnet')
    expect(selectProtocol(false, '1234', options.classes)).toBe('ssh')
  })

  it('defaults to ssh for unknown or missing classes', () => {
    expect(selectProtocol(false, '999', options.classes)).toBe('ssh')
    expect(selectProtocol(false, undefined, options.classes)).toBe('ssh')
  })

  it('ignores inherited object keys', () => {
    expect(selectProtocol(false, 'toString', options.classes)).toBe('ssh')
  })
})

describe('encodeRelayCommand', () => {
  it('produces the SpectroServer relay line', () => {
    expect(encodeRelayCommand('10.0.0.5', 23)).toBe('relay 10.0.0.5 23\r\n')
    expect(Buffer.from(encodeRelayCommand('172.31.100.20', 22), 'ascii')).toEqual(
      Buffer.from([
        0x72, 0x65, 0x6c, 0x61, 0x79, 0x20, // "relay "
        0x31, 0x37, 0x32, 0x2e, 0x33, 0x31, 0x2e, 0x31, 0x30, 0x30, 0x2e, 0x32, 0x30, // "172.31.100.20"
        0x20, 0x32, 0x32, // " 22"
        0x0d, 0x0a,
      ]),
    )
  })
})

describe('selectAndEncode', () => {
  it('encodes ssh for a bare address', () => {
    expect(selectAndEncode({ ip: '172.31.100.20' }, false, '192.0.2.50', options)).toEqual({
      protocol: 'ssh',
      deviceIp: '172.31.100.20',
      devicePort: 22,
      relayHost: '192.0.2.50',
      relayPort: 31415,
      command: 'relay 172.31.100.20 22\r\n',
    })
  })

  it('encodes telnet for a telnet-class device', () => {
    const spec = selectAndEncode({ ip: '10.0.0.5', deviceClass: TELNET_FAMILY }, false, '192.0.2.50', options)
    expect(spec.protocol).toBe('telnet')
    expect(spec.command).toBe('relay 10.0.0.5 23\r\n')
  })

  it('uses an explicit device port over the protocol default', () => {
    const spec = selectAndEncode({ ip: '10.0.0.5' }, true, '192.0.2.50', { ...options, devicePort: 2323 })
    expect(spec.devicePort).toBe(2323)
    expect(spec.command).toBe('relay 10.0.0.5 2323\r\n')
  })

  it('trims the relay host', () => {
    expect(selectAndEncode({ ip: '10.0.0.5' }, false, ' relay.example.net ', options).relayHost).toBe('relay.example.net')
  })

  it('fails with MissingRelayHost for an empty relay host regardless of other inputs', () => {
    for (const host of [undefined, '', '   ']) {
      expect(thrown(() => selectAndEncode({ ip: 'not-an-ip' }, true, host, options))).toMatchObject({
        kind: 'MissingRelayHost',
      })
    }
  })

  it('fails with InvalidAddress when the resolved address is not IPv4', () => {
    expect(thrown(() => selectAndEncode({ ip: 'fe80::1', name: 'CORE_RTR01' }, false, '192.0.2.50', options))).toMatchObject({
      kind: 'InvalidAddress',
      input: 'fe80::1',
      message: '"fe80::1" is not a valid IPv4 address (device CORE_RTR01)',
    })
  })
})
