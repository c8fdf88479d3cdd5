/**
 * Text strictly between the first `start` and the next `end` after it.
 * Returns '' when `start` does not occur, or when no `end` follows it.
 */
export function textBetween(value: string, start: string, end: string): string {
  const startIndex = value.indexOf(start)
  if (startIndex === -1) return ''
  const from = startIndex + start.length
  const endIndex = value.indexOf(end, from)
  if (endIndex === -1) return ''
  return value.slice(from, endIndex)
}
