import {
  type ExternalFile,
  isNotionPropertyType,
  type NotionPropertyValue,
  type PropertyInput,
} from '@root/types/notion.types.js'
import { NotionError, UnsupportedPropertyTypeError } from '@utils/errors.js'

const asText = (value: PropertyInput): string =>
  value instanceof Date ? value.toISOString() : String(value)

const asList = (value: PropertyInput): Array<string | number> =>
  Array.isArray(value) ? value : [asText(value)]

const toExternalFile = (url: string): ExternalFile => ({
  type: 'external',
  name: url.split('/').pop() || url,
  external: { url },
})

function toNumber(value: PropertyInput, name?: string): number {
  const number =
    typeof value === 'number'
      ? value
      : value instanceof Date
        ? value.getTime()
        : typeof value === 'string' && value.trim() !== ''
          ? Number(value)
          : Number.NaN
  if (!Number.isFinite(number)) {
    throw new NotionError(
      `Cannot format ${JSON.stringify(value)} as a number${name ? ` for "${name}"` : ''}`,
    )
  }
  return number
}

/**
 * Maps a raw value to the page-property payload for a column type.
 *
 * Arrays are accepted for `multi_select` and `files` (one entry per item);
 * `Date` values become ISO strings for `date`.
 *
 * @param propertyName - only used in error messages
 * @throws UnsupportedPropertyTypeError for types outside the supported set,
 *   before any request is made
 */
export function formatProperty(
  propertyType: string,
  value: PropertyInput,
  propertyName?: string,
): NotionPropertyValue {
  if (!isNotionPropertyType(propertyType)) {
    throw new UnsupportedPropertyTypeError(propertyType, propertyName)
  }

  switch (propertyType) {
    case 'title':
      return { title: [{ text: { content: asText(value) } }] }
    case 'rich_text':
      return { rich_text: [{ text: { content: asText(value) } }] }
    case 'select':
      return { select: { name: asText(value) } }
    case 'multi_select':
      return {
        multi_select: asList(value).map((item) => ({ name: String(item) })),
      }
    case 'number':
      return { number: toNumber(value, propertyName) }
    case 'checkbox':
      return { checkbox: Boolean(value) }
    case 'date':
      return { date: { start: asText(value) } }
    case 'url':
      return { url: asText(value) }
    case 'email':
      return { email: asText(value) }
    case 'phone_number':
      return { phone_number: asText(value) }
    case 'status':
      return { status: { name: asText(value) } }
    case 'files':
      return {
        files: asList(value).map((url) => toExternalFile(String(url))),
      }
  }
}

export type RowFields = Record<string, { type: string; value: PropertyInput }>

/**
 * Formats every column of a row. Fails on the first unsupported type.
 */
export function formatProperties(
  fields: RowFields,
): Record<string, NotionPropertyValue> {
  return Object.fromEntries(
    Object.entries(fields).map(([name, { type, value }]) => [
      name,
      formatProperty(type, value, name),
    ]),
  )
}
