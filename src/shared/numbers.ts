const HEX_PATTERN = /^0x([0-9a-f]+)$/i
const DECIMAL_PATTERN = /^(\d+)([km]?)$/i

const UNITS: Record<string, number> = {
  '': 1,
  k: 1024,
  m: 1024 * 1024,
}

export function parseSize(input: string, name = 'value'): number {
  const text = input.trim().replace(/_/g, '')

  const hex = text.match(HEX_PATTERN)
  if (hex) {
    return checkSafe(parseInt(hex[1], 16), input, name)
  }

  const decimal = text.match(DECIMAL_PATTERN)
  if (decimal) {
    return checkSafe(parseInt(decimal[1], 10) * UNITS[decimal[2].toLowerCase()], input, name)
  }

  throw new Error(`Invalid ${name}: ${input}`)
}

function checkSafe(value: number, input: string, name: string): number {
  if (!Number.isSafeInteger(value)) {
    throw new Error(`Invalid ${name}: ${input} is out of range`)
  }
  return value
}
