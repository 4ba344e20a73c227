import type { DecimalPhysical } from './types';

/** Largest decimal precision the catalog accepts. */
export const MAX_DECIMAL_PRECISION = 38;

const pow10 = (exponent: number): bigint => 10n ** BigInt(exponent);

/**
 * Smallest byte width of a two's-complement integer able to hold every
 * unscaled value of the given precision.
 */
export const minBytesForPrecision = (precision: number): number => {
  const maxUnscaled = pow10(precision) - 1n;
  let bytes = 1;
  while ((1n << BigInt(8 * bytes - 1)) - 1n < maxUnscaled) {
    bytes++;
  }
  return bytes;
};

export const isWithinBounds = (precision: number, scale: number): boolean =>
  Number.isInteger(precision) &&
  Number.isInteger(scale) &&
  precision >= 1 &&
  precision <= MAX_DECIMAL_PRECISION &&
  scale >= 0 &&
  scale <= precision;

export const canonicalPhysical = (precision: number): DecimalPhysical => {
  if (precision <= 9) return { type: 'INT32' };
  if (precision <= 18) return { type: 'INT64' };
  return { type: 'FIXED_LEN_BYTE_ARRAY', length: minBytesForPrecision(precision) };
};

/**
 * Small precisions must be integer-backed; wide ones must sit in a fixed-length
 * array wide enough for the precision.
 */
export const isCanonicalPhysical = (precision: number, physical: DecimalPhysical): boolean => {
  switch (physical.type) {
    case 'INT32':
      return precision <= 9;
    case 'INT64':
      return precision > 9 && precision <= 18;
    case 'FIXED_LEN_BYTE_ARRAY':
      return precision > 18 && physical.length >= minBytesForPrecision(precision);
    case 'BYTE_ARRAY':
      return false;
    default: {
      const exhaustive: never = physical;
      return exhaustive;
    }
  }
};

/**
 * Nearest in-bounds decimal for an out-of-bounds declaration: keep as many
 * integral digits as declared (up to the maximum), then as much scale as fits.
 */
export const nearestSupported = (precision: number, scale: number): { precision: number; scale: number } => {
  const integralDigits = Math.min(Math.max(0, precision - scale), MAX_DECIMAL_PRECISION);
  const nextScale = Math.min(Math.max(scale, 0), MAX_DECIMAL_PRECISION - integralDigits);
  return { precision: Math.max(1, integralDigits + nextScale), scale: nextScale };
};

export type RescaleResult = { ok: true; value: bigint } | { ok: false; reason: string };

/**
 * Cast an unscaled value from one decimal type to another. Never rounds: a value
 * whose dropped digits are non-zero, or that needs more digits than the target
 * precision, is reported instead.
 */
export const rescale = (unscaled: bigint, fromScale: number, toPrecision: number, toScale: number): RescaleResult => {
  let value = unscaled;
  if (toScale > fromScale) {
    value = unscaled * pow10(toScale - fromScale);
  } else if (toScale < fromScale) {
    const divisor = pow10(fromScale - toScale);
    if (unscaled % divisor !== 0n) {
      return { ok: false, reason: `needs more than ${toScale} fraction digits` };
    }
    value = unscaled / divisor;
  }

  const magnitude = value < 0n ? -value : value;
  if (magnitude >= pow10(toPrecision)) {
    return { ok: false, reason: `needs more than ${toPrecision} digits` };
  }
  return { ok: true, value };
};

/** Render an unscaled value at the given scale, e.g. (-1234n, 2) -> "-12.34". */
export const formatUnscaled = (unscaled: bigint, scale: number): string => {
  const negative = unscaled < 0n;
  const digits = (negative ? -unscaled : unscaled).toString();
  if (scale <= 0) {
    return `${negative ? '-' : ''}${digits}${'0'.repeat(-scale)}`;
  }
  const padded = digits.padStart(scale + 1, '0');
  const integral = padded.slice(0, padded.length - scale);
  const fraction = padded.slice(padded.length - scale);
  return `${negative ? '-' : ''}${integral}.${fraction}`;
};

const DECIMAL_TEXT = /^([+-]?)(\d*)(?:\.(\d*))?$/;

/**
 * Parse the text form of a decimal into its unscaled value at `scale`.
 * Returns undefined for text that is not a plain decimal or carries more
 * significant fraction digits than the scale allows.
 */
export const parseUnscaled = (text: string, scale: number): bigint | undefined => {
  const match = DECIMAL_TEXT.exec(text.trim());
  if (!match) return undefined;

  const [, sign, integral = '', fraction = ''] = match;
  if (integral === '' && fraction === '') return undefined;

  const significantFraction = fraction.replace(/0+$/, '');
  if (significantFraction.length > Math.max(scale, 0)) return undefined;

  const digits = `${integral || '0'}${fraction.padEnd(Math.max(scale, 0), '0').slice(0, Math.max(scale, 0))}`;
  let value = BigInt(digits);
  if (scale < 0) {
    const divisor = pow10(-scale);
    if (value % divisor !== 0n) return undefined;
    value /= divisor;
  }
  return sign === '-' ? -value : value;
};
