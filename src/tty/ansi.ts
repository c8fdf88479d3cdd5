export function isTty(stream: NodeJS.WritableStream): boolean {
  return 'isTTY' in stream && stream.isTTY === true
}

export function ansi(code: string, value: string, enabled: boolean): string {
  if (!enabled) return value
  return `\u001b[${code}m${value}\u001b[0m`
}
