/**
 * Character code constants and classification functions
 * Only the code units the block scanner, inline renderer and escapers branch on.
 */

export const enum CharacterCodes {
  nullCharacter = 0,
  maxAsciiCharacter = 0x7F,

  lineFeed = 0x0A,              // \n
  carriageReturn = 0x0D,        // \r

  space = 0x20,
  exclamation = 0x21,           // !
  doubleQuote = 0x22,           // "
  hash = 0x23,                  // #
  dollar = 0x24,                // $
  percent = 0x25,               // %
  ampersand = 0x26,             // &
  singleQuote = 0x27,           // '
  asterisk = 0x2A,              // *
  plus = 0x2B,                  // +
  comma = 0x2C,                 // ,
  minus = 0x2D,                 // -
  dot = 0x2E,                   // .
  slash = 0x2F,                 // /

  _0 = 0x30,                    // 0
  _9 = 0x39,                    // 9

  colon = 0x3A,                 // :
  semicolon = 0x3B,             // ;
  lessThan = 0x3C,              // <
  equals = 0x3D,                // =
  greaterThan = 0x3E,           // >
  question = 0x3F,              // ?
  at = 0x40,                    // @

  A = 0x41,
  Z = 0x5A,

  openBracket = 0x5B,           // [
  backslash = 0x5C,             // \
  closeBracket = 0x5D,          // ]
  underscore = 0x5F,            // _
  backtick = 0x60,              // `

  a = 0x61,
  z = 0x7A,

  tilde = 0x7E,                 // ~

  replacementCharacter = 0xFFFD,
}

export function isAsciiAlphaNumeric(ch: number): boolean {
  return (ch >= CharacterCodes.a && ch <= CharacterCodes.z) ||
         (ch >= CharacterCodes.A && ch <= CharacterCodes.Z) ||
         (ch >= CharacterCodes._0 && ch <= CharacterCodes._9);
}

/**
 * Characters that survive URL normalization untouched: the unreserved marks
 * plus the reserved delimiters and '%' (an existing escape stays as it is).
 */
export function isUrlSafePunctuation(ch: number): boolean {
  switch (ch) {
    case CharacterCodes.exclamation:
    case CharacterCodes.hash:
    case CharacterCodes.dollar:
    case CharacterCodes.ampersand:
    case CharacterCodes.asterisk:
    case CharacterCodes.plus:
    case CharacterCodes.comma:
    case CharacterCodes.slash:
    case CharacterCodes.colon:
    case CharacterCodes.semicolon:
    case CharacterCodes.equals:
    case CharacterCodes.question:
    case CharacterCodes.at:
    case CharacterCodes.openBracket:
    case CharacterCodes.closeBracket:
    case CharacterCodes.minus:
    case CharacterCodes.dot:
    case CharacterCodes.underscore:
    case CharacterCodes.tilde:
    case CharacterCodes.percent:
      return true;
    default:
      return false;
  }
}

/**
 * Number of bytes the code point occupies in UTF-8.
 * Positions in error messages are byte offsets, so the inline renderer
 * advances by this rather than by UTF-16 units.
 */
export function utf8Length(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

/** True when a UTF-16 surrogate pair (one astral code point) starts at pos. */
export function isSurrogatePairAt(text: string, pos: number): boolean {
  const high = text.charCodeAt(pos);
  if (high < 0xD800 || high > 0xDBFF) return false;
  const low = text.charCodeAt(pos + 1);
  return low >= 0xDC00 && low <= 0xDFFF;
}
