/** Literal HTML fragments written around rendered constructs. */
export const HtmlMarkup = {
  PARAGRAPH_START: '<p>',
  PARAGRAPH_END: '\n</p>\n',
  CODE_BLOCK_START: '<pre><code>',
  CODE_BLOCK_END: '</code></pre>\n',
  BOLD_START: '<strong>',
  BOLD_END: '</strong>',
  CODE_START: '<code>',
  CODE_END: '</code>',
  NEWLINE: '\n',
} as const;

/** A line consisting of exactly this text opens or closes a code block. */
export const CODE_FENCE = '```';
