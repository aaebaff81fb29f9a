/**
 * Render errors
 *
 * Every failure is fatal to the render call that raised it. Output already
 * written to the sink stays there.
 */

/**
 * Render error codes for machine-readable diagnostics
 */
export enum RenderErrorCode {
  UNCLOSED_CODE_FENCE = 'unclosed-code-fence',
  UNCLOSED_BOLD = 'unclosed-bold',
  UNCLOSED_INLINE_CODE = 'unclosed-inline-code',
  UNCLOSED_LINK = 'unclosed-link',
  MALFORMED_LINK = 'malformed-link'
}

export interface RenderErrorDetails {
  /** 1-based line number, once known */
  line?: number;

  /** Byte offset (UTF-8) within the line where the offending construct opened */
  position?: number;

  cause?: unknown;
}

export class RenderError extends Error {
  readonly code: RenderErrorCode;
  readonly line: number | undefined;
  readonly position: number | undefined;

  constructor(code: RenderErrorCode, message: string, details: RenderErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'RenderError';
    this.code = code;
    this.line = details.line;
    this.position = details.position;
  }

  /** Re-raises a paragraph line error with the line it occurred on. */
  atLine(line: number): RenderError {
    return new RenderError(this.code, `line ${line}: ${this.message}`, {
      line,
      position: this.position,
      cause: this
    });
  }
}

export function unclosedCodeFence(openLine: number): RenderError {
  return new RenderError(
    RenderErrorCode.UNCLOSED_CODE_FENCE,
    `unclosed code block (\`\`\`) on line: ${openLine}`,
    { line: openLine });
}

export function unclosedBold(position: number): RenderError {
  return new RenderError(RenderErrorCode.UNCLOSED_BOLD, `unclosed bold text (*) at position: ${position}`, { position });
}

export function unclosedInlineCode(position: number): RenderError {
  return new RenderError(RenderErrorCode.UNCLOSED_INLINE_CODE, `unclosed code text (\`) at position: ${position}`, { position });
}

export function unclosedLink(position: number): RenderError {
  return new RenderError(RenderErrorCode.UNCLOSED_LINK, `unclosed link ([) at position: ${position}`, { position });
}

export function malformedLink(content: string, position: number): RenderError {
  return new RenderError(
    RenderErrorCode.MALFORMED_LINK,
    `Links must have a URL and a Label separated by a space. Instead found: ${content}`,
    { position });
}
