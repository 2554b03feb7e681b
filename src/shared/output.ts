export function formatOutput(data: unknown, pretty?: boolean): string {
  return pretty ? JSON.stringify(data, replaceBytes, 2) : JSON.stringify(data, replaceBytes)
}

export function formatAddress(value: number, width = 8): string {
  const sign = value < 0 ? '-' : ''
  return `${sign}0x${Math.abs(value).toString(16).toUpperCase().padStart(width, '0')}`
}

// Buffer#toJSON runs before the replacer sees the value, so match its { type, data } shape too.
function replaceBytes(_key: string, value: unknown): unknown {
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString('hex').toUpperCase()
  }
  if (isSerializedBuffer(value)) {
    return Buffer.from(value.data).toString('hex').toUpperCase()
  }
  return value
}

function isSerializedBuffer(value: unknown): value is { type: 'Buffer'; data: number[] } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'Buffer' &&
    'data' in value &&
    Array.isArray(value.data)
  )
}
