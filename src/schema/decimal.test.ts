import {
  canonicalPhysical,
  formatUnscaled,
  isCanonicalPhysical,
  isWithinBounds,
  minBytesForPrecision,
  nearestSupported,
  parseUnscaled,
  rescale,
} from './decimal';

describe('minBytesForPrecision', () => {
  it.each([
    [2, 1],
    [3, 2],
    [9, 4],
    [18, 8],
    [19, 9],
    [38, 16],
  ])('precision %i needs %i bytes', (precision, bytes) => {
    expect(minBytesForPrecision(precision)).toBe(bytes);
  });
});

describe('bounds and physical storage', () => {
  it('accepts precision 1..38 with scale 0..precision', () => {
    expect(isWithinBounds(38, 38)).toBe(true);
    expect(isWithinBounds(1, 0)).toBe(true);
    expect(isWithinBounds(39, 0)).toBe(false);
    expect(isWithinBounds(10, 11)).toBe(false);
    expect(isWithinBounds(10, -1)).toBe(false);
  });

  it('stores small precisions in integers and wide ones in fixed-length arrays', () => {
    expect(canonicalPhysical(5)).toEqual({ type: 'INT32' });
    expect(canonicalPhysical(12)).toEqual({ type: 'INT64' });
    expect(canonicalPhysical(20)).toEqual({ type: 'FIXED_LEN_BYTE_ARRAY', length: 9 });
  });

  it('rejects a fixed-length array for a precision that fits an integer', () => {
    expect(isCanonicalPhysical(10, { type: 'FIXED_LEN_BYTE_ARRAY', length: 5 })).toBe(false);
    expect(isCanonicalPhysical(20, { type: 'FIXED_LEN_BYTE_ARRAY', length: 16 })).toBe(true);
    expect(isCanonicalPhysical(20, { type: 'FIXED_LEN_BYTE_ARRAY', length: 8 })).toBe(false);
    expect(isCanonicalPhysical(4, { type: 'BYTE_ARRAY' })).toBe(false);
  });
});

describe('nearestSupported', () => {
  it('keeps the integral digits and trims the scale', () => {
    expect(nearestSupported(40, 10)).toEqual({ precision: 38, scale: 8 });
    expect(nearestSupported(50, 0)).toEqual({ precision: 38, scale: 0 });
  });

  it('clamps negative and oversized scales', () => {
    expect(nearestSupported(5, -2)).toEqual({ precision: 7, scale: 0 });
    expect(nearestSupported(3, 5)).toEqual({ precision: 5, scale: 5 });
  });
});

describe('rescale', () => {
  it('multiplies when the scale grows', () => {
    expect(rescale(12345n, 2, 10, 4)).toEqual({ ok: true, value: 1234500n });
  });

  it('divides exactly when the dropped digits are zero', () => {
    expect(rescale(12340n, 3, 5, 2)).toEqual({ ok: true, value: 1234n });
    expect(rescale(-500n, 2, 3, 1)).toEqual({ ok: true, value: -50n });
  });

  it('reports values that would lose fraction digits', () => {
    expect(rescale(12345n, 3, 5, 2)).toEqual({ ok: false, reason: 'needs more than 2 fraction digits' });
  });

  it('reports values wider than the target precision', () => {
    expect(rescale(123456n, 0, 5, 0)).toEqual({ ok: false, reason: 'needs more than 5 digits' });
  });
});

describe('formatUnscaled', () => {
  it('renders the decimal point at the scale', () => {
    expect(formatUnscaled(-1234n, 2)).toBe('-12.34');
    expect(formatUnscaled(5n, 3)).toBe('0.005');
    expect(formatUnscaled(12n, 0)).toBe('12');
    expect(formatUnscaled(12n, -2)).toBe('1200');
  });
});

describe('parseUnscaled', () => {
  it('reads plain decimal text at the given scale', () => {
    expect(parseUnscaled('12.34', 2)).toBe(1234n);
    expect(parseUnscaled('-0.5', 3)).toBe(-500n);
    expect(parseUnscaled('.5', 1)).toBe(5n);
    expect(parseUnscaled('1.2300', 2)).toBe(123n);
    expect(parseUnscaled('1200', -2)).toBe(12n);
  });

  it('refuses text that does not fit the scale or is not a plain decimal', () => {
    expect(parseUnscaled('1.234', 2)).toBeUndefined();
    expect(parseUnscaled('1e5', 0)).toBeUndefined();
    expect(parseUnscaled('abc', 2)).toBeUndefined();
    expect(parseUnscaled('1250', -2)).toBeUndefined();
  });
});
