/**
 * Accept only a single string of digits naming a positive integer.
 * Anything else (arrays, signs, blanks, zero) counts as absent.
 */
export const parsePositiveInt = (value: unknown): number | null => {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    return null;
  }
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : null;
};
