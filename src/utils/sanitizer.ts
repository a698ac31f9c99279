// C0/C1 control characters plus the Unicode line/paragraph separators.
const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f\u2028\u2029]/g;
const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*]/g;
const LONE_SURROGATES =
  /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

// Lengths count code points so a cut never splits a surrogate pair.
function takeCodePoints(text: string, count: number): string {
  return Array.from(text).slice(0, count).join('');
}

export function sanitizeText(text: string | null | undefined): string {
  if (text == null) return '';
  if (typeof text !== 'string') return String(text);
  return text.replace(CONTROL_CHARS, ' ').replace(/\s+/g, ' ').trim();
}

export function truncateText(text: string, maxLength: number): string {
  const chars = Array.from(text);
  if (maxLength < 4) {
    return chars[0] ?? '';
  }
  if (chars.length <= maxLength) {
    return text;
  }
  return chars.slice(0, maxLength - 3).join('') + '...';
}

/**
 * Turns an untrusted title into a filename base: no path separators, no
 * control characters, no leading dots, bounded length.
 */
export function sanitizeFilename(
  title: string | null | undefined,
  maxLength: number,
  fallback = 'download'
): string {
  const cleaned = takeCodePoints(
    sanitizeText(title)
      .replace(UNSAFE_FILENAME_CHARS, '_')
      .replace(/^[.\s]+/, ''),
    maxLength
  ).trim();
  return cleaned || fallback;
}

/** Header values must be visible ASCII; anything else is dropped. */
export function toAsciiHeaderValue(value: string): string {
  return value
    .replace(/[^\x20-\x7e]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * `attachment; filename="<ascii>"; filename*=UTF-8''<encoded>` so that
 * non-ASCII titles survive without breaking the quoted form.
 */
export function buildContentDisposition(filename: string): string {
  const wellFormed = filename.replace(LONE_SURROGATES, '');
  const ascii =
    toAsciiHeaderValue(wellFormed).replace(/["\\]/g, '_') || 'download';
  const encoded = encodeURIComponent(wellFormed).replace(
    /['()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
  return `attachment; filename="${ascii}"; filename*=UTF-8''${encoded}`;
}

/** Reduces a URL to `scheme://host` for logging. */
export function redactUrl(value: string): string {
  if (!URL.canParse(value)) return '[REDACTED]';
  const url = new URL(value);
  return `${url.protocol}//${url.hostname}`;
}
