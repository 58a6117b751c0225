/**
 * spectro-connect — Spectrum model search request
 */

/** Spectrum attribute IDs requested for each matched model */
export const ATTR = {
  modelName: '0x1006e',
  networkAddress: '0x12d7f',
  ncmDeviceFamily: '0x12bef',
} as const

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

/**
 * Devices-only search for models whose name contains `name`. Spectrum
 * ignores case for this filter.
 */
export function buildModelSearchRequest(name: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<rs:model-request throttlesize="60000"
  xmlns:rs="http://www.ca.com/spectrum/restful/schema/request"
  xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance"
  xsi:schemaLocation="http://www.ca.com/spectrum/restful/schema/request ../../../xsd/Request.xsd">
  <rs:target-models>
    <rs:models-search>
      <rs:search-criteria xmlns="http://www.ca.com/spectrum/restful/schema/filter">
        <devices-only-search />
        <filtered-models>
          <has-substring-ignore-case>
            <model-name>${escapeXml(name)}</model-name>
          </has-substring-ignore-case>
        </filtered-models>
      </rs:search-criteria>
    </rs:models-search>
  </rs:target-models>
  <rs:requested-attribute id="${ATTR.modelName}" />
  <rs:requested-attribute id="${ATTR.networkAddress}" />
  <rs:requested-attribute id="${ATTR.ncmDeviceFamily}" />
</rs:model-request>
`
}
