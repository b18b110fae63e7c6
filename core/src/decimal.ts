/**
 * Decimal helpers
 *
 * Decimals are carried as an unscaled bigint plus a scale:
 * `12.50` is `{ unscaled: 1250n, scale: 2 }`. Text is parsed and printed
 * exactly, trailing zeros included.
 */

export const MAX_DECIMAL_PRECISION = 38;

export interface DecimalParts {
  unscaled: bigint;
  scale: number;
}

const DECIMAL_TEXT = /^([+-]?)(\d*)(?:\.(\d*))?$/;

/**
 * Parse decimal text such as `-12.50` or `.5`.
 *
 * @throws RangeError on anything that is not a plain decimal literal
 */
export function parseDecimal(text: string): DecimalParts {
  const match = DECIMAL_TEXT.exec(text.trim());
  const intPart = match?.[2] ?? '';
  const fracPart = match?.[3] ?? '';
  if (match === null || intPart.length + fracPart.length === 0) {
    throw new RangeError(`Invalid decimal '${text}'`);
  }
  const magnitude = BigInt(intPart + fracPart);
  return {
    unscaled: match[1] === '-' ? -magnitude : magnitude,
    scale: fracPart.length,
  };
}

export function formatDecimal(unscaled: bigint, scale: number): string {
  const neg = unscaled < 0n;
  let digits = (neg ? -unscaled : unscaled).toString();
  if (scale > 0) {
    digits = digits.padStart(scale + 1, '0');
    digits = `${digits.slice(0, -scale)}.${digits.slice(-scale)}`;
  }
  return neg ? `-${digits}` : digits;
}

/**
 * Number of significant digits in the unscaled value (at least 1).
 */
export function decimalPrecision(unscaled: bigint): number {
  return (unscaled < 0n ? -unscaled : unscaled).toString().length;
}
