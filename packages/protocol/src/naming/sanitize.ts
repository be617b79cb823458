// Name sanitation
// Turns a display name into a name that is safe as a single path segment.

/**
 * Characters that are illegal in a path segment on at least one common file system
 */
const ILLEGAL_CHARACTERS = /[<>:"/\\|?*\u0000-\u001f\u007f]/g;

/**
 * UTF-16 halves without their partner; they cannot be encoded as UTF-8
 */
const LONE_SURROGATES = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

const RESERVED_DEVICE_NAMES = /^(con|prn|aux|nul|com[1-9]|lpt[1-9])(\..*)?$/i;

/**
 * Default cap on the length of a sanitized name, in code points
 */
export const DEFAULT_MAX_NAME_LENGTH = 200;

/**
 * Sanitize a raw name for use as a path segment.
 * Illegal characters and unpaired surrogates become `_`, surrounding
 * whitespace and trailing dots are removed and the result is capped at
 * `maxLength` code points. May return an empty string; use `effectiveName`
 * when a fallback is needed.
 */
export function sanitizeName(raw: string, maxLength: number = DEFAULT_MAX_NAME_LENGTH): string {
  let name = raw.replace(ILLEGAL_CHARACTERS, '_').replace(LONE_SURROGATES, '_');
  name = trimName(name);

  const codePoints = Array.from(name);
  if (codePoints.length > maxLength) {
    name = trimName(codePoints.slice(0, maxLength).join(''));
  }

  if (RESERVED_DEVICE_NAMES.test(name)) {
    name = `${name}_`;
  }

  return name;
}

/**
 * Sanitize a raw name, falling back to `fallback` when nothing usable is left
 */
export function effectiveName(
  raw: string,
  fallback: string,
  maxLength: number = DEFAULT_MAX_NAME_LENGTH
): string {
  const name = sanitizeName(raw, maxLength);
  return name.length > 0 ? name : sanitizeName(fallback, maxLength);
}

function trimName(name: string): string {
  return name.trim().replace(/[. ]+$/, '');
}
