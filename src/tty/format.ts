const UNITS = ['KB', 'MB', 'GB', 'TB']

export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < 1024) return `${Math.max(0, Math.round(bytes || 0))} B`
  let value = bytes / 1024
  let unit = 0
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024
    unit++
  }
  return `${value.toFixed(1)} ${UNITS[unit]}`
}

/**
 * `label 1.5 MB / 3.0 MB (50%)`, or `label 1.5 MB` when the total is unknown.
 */
export function formatByteProgress({
  label,
  received,
  total,
}: {
  label: string
  received: number
  total: number | null
}): string {
  if (total === null || !Number.isFinite(total) || total <= 0) {
    return `${label} ${formatBytes(received)}`
  }
  const percent = Math.min(100, Math.floor((received * 100) / total))
  return `${label} ${formatBytes(received)} / ${formatBytes(total)} (${percent}%)`
}
