/**
 * spectro-connect — Spectrum model response parsing
 *
 * A successful search looks like:
 *
 *   <model-response-list xmlns="..." total-models="1" throttle="1" error="EndOfResults">
 *     <model-responses>
 *       <model mh="0x1000a1">
 *         <attribute id="0x1006e">CORE_RTR01</attribute>
 *         <attribute id="0x12d7f">10.0.0.5</attribute>
 *         <attribute id="0x12bef">8519702</attribute>
 *       </model>
 *     </model-responses>
 *   </model-response-list>
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser'
import type { DeviceRecord } from '../resolve/types.js'
import { ATTR } from './request.js'

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  // Keep "8519702" and "0x1006e" as strings
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (name) => name === 'model' || name === 'attribute',
})

/** Thrown for anything that isn't a model response list we can read */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MalformedResponseError'
  }
}

type Dict = Record<string, unknown>

function isDict(val: unknown): val is Dict {
  return typeof val === 'object' && val !== null && !Array.isArray(val)
}

function asList(val: unknown): unknown[] {
  if (Array.isArray(val)) return val
  return val === undefined ? [] : [val]
}

/** Collect `<attribute id="...">text</attribute>` children into id → text */
function readAttributes(model: Dict): Map<string, string> {
  const attrs = new Map<string, string>()
  for (const entry of asList(model.attribute)) {
    if (!isDict(entry)) continue
    const id = entry['@_id']
    const text = entry['#text']
    if (typeof id === 'string' && typeof text === 'string' && text.trim() !== '') {
      attrs.set(id, text.trim())
    }
  }
  return attrs
}

export function parseModelResponse(xml: string): DeviceRecord[] {
  const valid = XMLValidator.validate(xml)
  if (valid !== true) {
    throw new MalformedResponseError(`Invalid XML from Spectrum: ${valid.err.msg} (line ${valid.err.line})`)
  }

  const doc: unknown = parser.parse(xml)
  const root = isDict(doc) ? doc['model-response-list'] : undefined
  // <model-response-list/> with no attributes parses to ''
  if (root === '') return []
  if (!isDict(root)) {
    throw new MalformedResponseError('Spectrum response has no model-response-list')
  }

  const responses = root['model-responses']
  if (!isDict(responses)) return []

  return asList(responses.model).filter(isDict).map((model) => {
    const attrs = readAttributes(model)
    const handle = typeof model['@_mh'] === 'string' ? model['@_mh'] : 'unknown'
    const name = attrs.get(ATTR.modelName) ?? handle
    const ip = attrs.get(ATTR.networkAddress)
    if (!ip) {
      throw new MalformedResponseError(`Model ${name} has no network address`)
    }
    return { name, ip, deviceClass: attrs.get(ATTR.ncmDeviceFamily) }
  })
}
