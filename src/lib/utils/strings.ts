/**
 * Shared string helpers.
 *
 * Canonical location: import from "@/lib/utils/strings".
 */

/**
 * Normalize an unknown value to a trimmed non-empty string or null.
 * Accepts `unknown` so it works with JSON bodies and env vars alike.
 */
export const normalizeString = (value: unknown): string | null => {
  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

/** True when the string holds ASCII control characters. */
export const hasControlCharacters = (value: string): boolean => {
  for (let index = 0; index < value.length; index += 1) {
    const code = value.charCodeAt(index);
    if (code <= 31 || code === 127) {
      return true;
    }
  }

  return false;
};
