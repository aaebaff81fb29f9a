import { escapeHtml, formatLink } from '../html-escape.js';
import { HtmlMarkup } from '../markup.js';
import type { OutputSink } from '../output-sink.js';
import {
  malformedLink,
  unclosedBold,
  unclosedInlineCode,
  unclosedLink
} from '../render-errors.js';
import { CharacterCodes, isSurrogatePairAt, utf8Length } from './character-codes.js';

/** Interpretation mode - only one active at a time. */
const enum InlineMode {
  /** Bold, code, link and escape controls are live. */
  Default = 0,

  /** Inside `...`: only '\' and the closing backtick are controls. */
  InCode = 1,

  /** Inside [...]: only '\' and ']' are controls; text is collected raw. */
  InLink = 2,
}

/**
 * Renders one paragraph line, writing HTML to out as it goes.
 *
 * Positions reported in errors are UTF-8 byte offsets of the opening control
 * character. A backslash at the very end of the line is dropped silently.
 */
export function renderLine(line: string, out: OutputSink): void {
  let mode: InlineMode = InlineMode.Default;
  let escapePending = false;

  // Byte offsets of the currently open controls, -1 when closed
  let boldStart = -1;
  let codeStart = -1;
  let linkStart = -1;

  // Raw (unescaped) text between '[' and ']'
  let linkContent = '';

  // Literal text is written in runs: [textStart, pos) is pending output
  let textStart = 0;

  let pos = 0;
  let byteOffset = 0;

  function flushText(end: number): void {
    if (end > textStart) out.write(escapeHtml(line.substring(textStart, end)));
  }

  while (pos < line.length) {
    const width = isSurrogatePairAt(line, pos) ? 2 : 1;
    const ch = line.charCodeAt(pos);
    const next = pos + width;

    if (escapePending) {
      // The escaped character is data: in a link it joins the raw content,
      // elsewhere it already opens the pending text run.
      escapePending = false;
      if (mode === InlineMode.InLink) linkContent += line.substring(pos, next);
    } else if (mode === InlineMode.InLink) {
      if (ch === CharacterCodes.backslash) {
        escapePending = true;
      } else if (ch === CharacterCodes.closeBracket) {
        closeLink();
        mode = InlineMode.Default;
        linkStart = -1;
        linkContent = '';
        textStart = next;
      } else {
        linkContent += line.substring(pos, next);
      }
    } else if (mode === InlineMode.InCode) {
      if (ch === CharacterCodes.backslash) {
        flushText(pos);
        textStart = next;
        escapePending = true;
      } else if (ch === CharacterCodes.backtick) {
        flushText(pos);
        textStart = next;
        out.write(HtmlMarkup.CODE_END);
        mode = InlineMode.Default;
        codeStart = -1;
      }
    } else {
      switch (ch) {
        case CharacterCodes.backslash:
          flushText(pos);
          textStart = next;
          escapePending = true;
          break;

        case CharacterCodes.asterisk:
          flushText(pos);
          textStart = next;
          if (boldStart < 0) {
            out.write(HtmlMarkup.BOLD_START);
            boldStart = byteOffset;
          } else {
            out.write(HtmlMarkup.BOLD_END);
            boldStart = -1;
          }
          break;

        case CharacterCodes.backtick:
          flushText(pos);
          textStart = next;
          out.write(HtmlMarkup.CODE_START);
          mode = InlineMode.InCode;
          codeStart = byteOffset;
          break;

        case CharacterCodes.openBracket:
          flushText(pos);
          textStart = next;
          mode = InlineMode.InLink;
          linkStart = byteOffset;
          linkContent = '';
          break;
      }
    }

    byteOffset += width === 2 ? 4 : utf8Length(ch);
    pos = next;
  }

  if (mode !== InlineMode.InLink) flushText(line.length);

  if (boldStart >= 0) throw unclosedBold(boldStart);
  if (codeStart >= 0) throw unclosedInlineCode(codeStart);
  if (linkStart >= 0) throw unclosedLink(linkStart);

  // Links are [url label]: the first space separates the two and the label
  // may contain further spaces.
  function closeLink(): void {
    const space = linkContent.indexOf(' ');
    const url = space < 0 ? '' : linkContent.substring(0, space);
    const label = space < 0 ? '' : linkContent.substring(space + 1);
    if (!url || !label) throw malformedLink(linkContent, linkStart);
    out.write(formatLink(url, label));
  }
}
