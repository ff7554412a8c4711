/**
 * Token amounts are integers scaled by 10^18. Division always truncates.
 */
export const DECIMALS = 18
export const SCALE = 10n ** BigInt(DECIMALS)

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/

/**
 * Parse a whole or decimal token amount ("10000", "0.5", 10_000) into fixed point.
 * Throws when the value has more than 18 fractional digits or is not a plain
 * non-negative decimal.
 */
export function parseTokens(amount: string | number | bigint): bigint {
  if (typeof amount === 'bigint') {
    if (amount < 0n) throw new RangeError(`Token amount must be non-negative, got ${amount}`)
    return amount * SCALE
  }

  const text = typeof amount === 'number' ? amount.toString() : amount.trim()
  const match = DECIMAL_PATTERN.exec(text)
  if (!match) {
    throw new RangeError(`Invalid token amount: "${text}"`)
  }

  const [, whole, fraction = ''] = match
  if (fraction.length > DECIMALS) {
    throw new RangeError(`Token amount "${text}" has more than ${DECIMALS} decimals`)
  }

  return BigInt(whole) * SCALE + BigInt(fraction.padEnd(DECIMALS, '0'))
}

/**
 * Render a fixed-point amount as a decimal string without trailing zeros.
 */
export function formatTokens(amount: bigint): string {
  const negative = amount < 0n
  const absolute = negative ? -amount : amount
  const whole = absolute / SCALE
  const fraction = (absolute % SCALE).toString().padStart(DECIMALS, '0').replace(/0+$/, '')

  const text = fraction.length > 0 ? `${whole}.${fraction}` : whole.toString()
  return negative ? `-${text}` : text
}

/**
 * Convert a fixed-point amount to base units of an asset with `decimals`
 * decimals, truncating anything smaller than one base unit.
 */
export function toBaseUnits(amount: bigint, decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > DECIMALS) {
    throw new RangeError(`Asset decimals must be an integer between 0 and ${DECIMALS}, got ${decimals}`)
  }
  return amount / 10n ** BigInt(DECIMALS - decimals)
}
