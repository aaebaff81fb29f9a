import { CharacterCodes } from './character-codes.js';

/**
 * Document text, either whole or as a sequence of chunks (for example the
 * decoded reads of a file). Line breaks may fall anywhere across chunks.
 */
export type RenderInput = string | Iterable<string>;

/**
 * Lazily splits the input into physical lines on '\n'.
 * A single '\r' before the break is dropped; a final line without a break is
 * still produced, but a trailing break does not produce an extra empty line.
 */
export function* readLines(input: RenderInput): Generator<string, void, undefined> {
  const chunks: Iterable<string> = typeof input === 'string' ? [input] : input;
  let pending = '';

  for (const chunk of chunks) {
    pending += chunk;
    let lineStart = 0;
    let lineEnd = pending.indexOf('\n', lineStart);
    while (lineEnd >= 0) {
      yield dropCarriageReturn(pending, lineStart, lineEnd);
      lineStart = lineEnd + 1;
      lineEnd = pending.indexOf('\n', lineStart);
    }
    pending = pending.substring(lineStart);
  }

  if (pending.length > 0) yield dropCarriageReturn(pending, 0, pending.length);
}

function dropCarriageReturn(text: string, start: number, end: number): string {
  if (end > start && text.charCodeAt(end - 1) === CharacterCodes.carriageReturn) end--;
  return text.substring(start, end);
}
