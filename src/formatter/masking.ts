export const MASK_CHAR = '•'
export const MAX_MASK_LENGTH = 8

/**
 * Replace a value with mask characters. Nothing of the original is kept;
 * the length is capped so long values do not leak their size.
 */
export function mask(value: string): string {
  return MASK_CHAR.repeat(Math.min(value.length, MAX_MASK_LENGTH))
}

export function renderFieldValue(value: unknown): string {
  if (typeof value === 'string') return value
  if (value === undefined) return ''
  return JSON.stringify(value)
}
