import type { NotionFilter } from '@root/types/notion.types.js'

type EqualsFilterType =
  | 'title'
  | 'rich_text'
  | 'number'
  | 'date'
  | 'select'
  | 'status'
  | 'checkbox'
  | 'url'
  | 'email'
  | 'phone_number'

export const equals = (
  property: string,
  type: EqualsFilterType,
  value: string | number | boolean,
): NotionFilter => ({ property, [type]: { equals: value } })

/** Rows whose date column is strictly before `date` (`YYYY-MM-DD`) */
export const dateBefore = (property: string, date: string): NotionFilter => ({
  property,
  date: { before: date },
})

export const dateOnOrAfter = (
  property: string,
  date: string,
): NotionFilter => ({
  property,
  date: { on_or_after: date },
})

export const and = (...filters: NotionFilter[]): NotionFilter => ({
  and: filters,
})
