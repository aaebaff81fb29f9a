/**
 * Contextual escaping for rendered output.
 *
 * Text in element content and text in an attribute value are escaped by
 * separate policies; a link's URL additionally passes through scheme
 * filtering and percent-normalization before it reaches the attribute.
 */

import { CharacterCodes, isAsciiAlphaNumeric, isUrlSafePunctuation } from './scanner/character-codes.js';

/** Substituted for a URL whose scheme is not allowed in an href. */
export const UNSAFE_URL_PLACEHOLDER = '#ZgotmplZ';

const SAFE_SCHEMES = ['http', 'https', 'mailto'];

const REPLACEMENT_CHARACTER = String.fromCharCode(CharacterCodes.replacementCharacter);

const utf8Encoder = new TextEncoder();

function entityFor(ch: number, escapePlus: boolean): string | undefined {
  switch (ch) {
    case CharacterCodes.doubleQuote: return '&#34;';
    case CharacterCodes.ampersand: return '&amp;';
    case CharacterCodes.singleQuote: return '&#39;';
    case CharacterCodes.lessThan: return '&lt;';
    case CharacterCodes.greaterThan: return '&gt;';
    case CharacterCodes.nullCharacter: return REPLACEMENT_CHARACTER;
    case CharacterCodes.plus: return escapePlus ? '&#43;' : undefined;
    default: return undefined;
  }
}

function replaceEntities(text: string, escapePlus: boolean): string {
  let result = '';
  let runStart = 0;
  for (let i = 0; i < text.length; i++) {
    const replacement = entityFor(text.charCodeAt(i), escapePlus);
    if (replacement === undefined) continue;
    result += text.substring(runStart, i) + replacement;
    runStart = i + 1;
  }
  // Fast path: nothing needed escaping
  if (runStart === 0) return text;
  return result + text.substring(runStart);
}

/** Escapes text placed in element content. */
export function escapeHtml(text: string): string {
  return replaceEntities(text, false);
}

/** Escapes text placed inside a double-quoted attribute value. */
export function escapeAttribute(text: string): string {
  return replaceEntities(text, true);
}

/**
 * Replaces the URL with {@link UNSAFE_URL_PLACEHOLDER} when it names a scheme
 * other than http, https or mailto. Text before the first ':' only counts as a
 * scheme when it contains no '/'; relative URLs pass unchanged.
 */
export function filterUrl(url: string): string {
  const colon = url.indexOf(':');
  if (colon < 0) return url;
  const scheme = url.substring(0, colon);
  if (scheme.includes('/')) return url;
  return SAFE_SCHEMES.includes(scheme.toLowerCase()) ? url : UNSAFE_URL_PLACEHOLDER;
}

/**
 * Percent-encodes every UTF-8 byte that may not appear literally in a URL,
 * using lowercase hex. Existing '%' escapes are preserved.
 */
export function normalizeUrl(url: string): string {
  let needsEncoding = false;
  for (let i = 0; i < url.length; i++) {
    const ch = url.charCodeAt(i);
    if (!isAsciiAlphaNumeric(ch) && !isUrlSafePunctuation(ch)) {
      needsEncoding = true;
      break;
    }
  }
  if (!needsEncoding) return url;

  let result = '';
  for (const byte of utf8Encoder.encode(url)) {
    if (byte <= CharacterCodes.maxAsciiCharacter && (isAsciiAlphaNumeric(byte) || isUrlSafePunctuation(byte))) {
      result += String.fromCharCode(byte);
    } else {
      result += '%' + byte.toString(16).padStart(2, '0');
    }
  }
  return result;
}

/** Full policy for a URL placed in an href attribute. */
export function escapeHrefAttribute(url: string): string {
  return escapeAttribute(normalizeUrl(filterUrl(url)));
}

/** Formats a hyperlink; the URL and label arrive unescaped. */
export function formatLink(url: string, label: string): string {
  return '<a href="' + escapeHrefAttribute(url) + '">' + escapeHtml(label) + '</a>';
}
