import type { TypeCounts } from '../secrets/types'

const COUNT_SUMMARY_PATTERN =
  /You have (\d+) secrets?: (\d+) static, (\d+) rotated, (\d+) dynamic, (\d+) other\./

export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`
}

export function formatCountSummary(counts: TypeCounts): string {
  const total = counts.static + counts.rotated + counts.dynamic + counts.other
  return `You have ${pluralize(total, 'secret')}: ${counts.static} static, ${counts.rotated} rotated, ${counts.dynamic} dynamic, ${counts.other} other.`
}

/**
 * Recover the counts from a rendered summary; null when the text holds none
 * or its total disagrees with the per-type figures
 */
export function parseCountSummary(text: string): TypeCounts | null {
  const match = COUNT_SUMMARY_PATTERN.exec(text)
  if (!match) return null

  const [total, staticCount, rotated, dynamic, other] = match.slice(1).map(Number)
  if (staticCount + rotated + dynamic + other !== total) return null

  return { static: staticCount, rotated, dynamic, other }
}
