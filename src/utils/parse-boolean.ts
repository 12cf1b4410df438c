// Shared with the Joi schema so env parsing and runtime parsing agree.
export const TRUE_WORDS = ['true', '1', 'yes', 'y', 'on'] as const;
export const FALSE_WORDS = ['false', '0', 'no', 'n', 'off'] as const;

const includesWord = (words: readonly string[], value: string): boolean => words.includes(value);

/** Unrecognised values yield the fallback rather than false. */
export function parseBoolean(value: unknown, fallback = false): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value !== 'string') {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (includesWord(TRUE_WORDS, normalized)) {
    return true;
  }
  if (includesWord(FALSE_WORDS, normalized)) {
    return false;
  }
  return fallback;
}
