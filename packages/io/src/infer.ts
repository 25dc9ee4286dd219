import type { Scalar } from '@tabflow/core';

const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Typed value of a raw CSV cell: '' is null, true/false (any case) are
 * booleans, numeric text is a number, everything else stays a string.
 */
export function inferScalar(raw: string): Scalar {
  if (raw === '') return null;

  const lower = raw.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;

  if (NUMBER_PATTERN.test(raw)) {
    const value = Number(raw);
    if (Number.isFinite(value)) return value;
  }
  return raw;
}
