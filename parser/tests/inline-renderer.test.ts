import { describe, expect, test } from 'vitest';
import { createStringSink } from '../output-sink.js';
import { RenderError, RenderErrorCode } from '../render-errors.js';
import { renderLine } from '../scanner/inline-renderer.js';

function renderInline(line: string): string {
  const out = createStringSink();
  renderLine(line, out);
  return out.toString();
}

function inlineError(line: string): RenderError {
  try {
    renderInline(line);
  } catch (error) {
    if (error instanceof RenderError) return error;
    throw error;
  }
  throw new Error('expected a RenderError for: ' + line);
}

describe('Inline renderer: bold and code', () => {
  test('text between asterisks is bold', () => {
    expect(renderInline('a *bold* word')).toBe('a <strong>bold</strong> word');
  });

  test('text between backticks is code', () => {
    expect(renderInline('a `programmer` word')).toBe('a <code>programmer</code> word');
  });

  test('bold may wrap inline code', () => {
    expect(renderInline('*a `b` c*')).toBe('<strong>a <code>b</code> c</strong>');
  });

  test('asterisk inside code is literal', () => {
    expect(renderInline('`p := *b`')).toBe('<code>p := *b</code>');
  });

  test('escaped backtick stays inside code', () => {
    expect(renderInline('`a\\`b`')).toBe('<code>a`b</code>');
  });

  test('code content is escaped', () => {
    expect(renderInline('`a && b`')).toBe('<code>a &amp;&amp; b</code>');
  });

  test('stray closing bracket is plain text', () => {
    expect(renderInline('a ] b')).toBe('a ] b');
  });
});

describe('Inline renderer: escaping', () => {
  test('basic HTML control characters are escaped', () => {
    expect(renderInline("<script>alert('xss')</script>")).toBe('&lt;script&gt;alert(&#39;xss&#39;)&lt;/script&gt;');
  });

  test('NUL becomes the replacement character', () => {
    expect(renderInline('a\u0000b')).toBe('a\uFFFDb');
  });

  test('non-ASCII text passes through', () => {
    expect(renderInline('héllo 😀 *wörld*')).toBe('héllo 😀 <strong>wörld</strong>');
  });

  const escapes: [input: string, output: string][] = [
    ['\\', ''],
    ['\\\\', '\\'],
    ['\\\\\\', '\\'],
    ['\\\\\\\\', '\\\\'],
    ['\\*', '*'],
    ['\\\\**', '\\<strong></strong>'],
    ['\\`x', '`x'],
    ['\\[1 2]', '[1 2]'],
    ['\\<', '&lt;'],
  ];

  for (const [input, output] of escapes) {
    test(`escape ${JSON.stringify(input)}`, () => {
      expect(renderInline(input)).toBe(output);
    });
  }
});

describe('Inline renderer: links', () => {
  const links: [input: string, output: string][] = [
    ['[1 2]', '<a href="1">2</a>'],
    ['[1 2 3]', '<a href="1">2 3</a>'],
    ['[1*2* 3]', '<a href="1*2*">3</a>'],
    ['[1 *2* 3]', '<a href="1">*2* 3</a>'],
    ['[1 *2*3]', '<a href="1">*2*3</a>'],
    ['[1 \\*2*3]', '<a href="1">*2*3</a>'],
    ['[1 \\\\*2*3]', '<a href="1">\\*2*3</a>'],
    ['[1 \\]]', '<a href="1">]</a>'],
    ['[1 `x`]', '<a href="1">`x`</a>'],
    ['[1 <]', '<a href="1">&lt;</a>'],
    ['[<a 2]', '<a href="%3ca">2</a>'],
    ['[/é x]', '<a href="/%c3%a9">x</a>'],
    ['[/a+b c]', '<a href="/a&#43;b">c</a>'],
    ['[https://example.com/a?b=1&c=2 go]', '<a href="https://example.com/a?b=1&amp;c=2">go</a>'],
    ['[javascript:alert(1) click]', '<a href="#ZgotmplZ">click</a>'],
    ['see [http://x.io site] now', 'see <a href="http://x.io">site</a> now'],
  ];

  for (const [input, output] of links) {
    test(`link ${input}`, () => {
      expect(renderInline(input)).toBe(output);
    });
  }

  for (const input of ['[1]', '[]', '[1 ]', '[ 2]']) {
    test(`malformed link ${input}`, () => {
      const error = inlineError(input);
      expect(error.code).toBe(RenderErrorCode.MALFORMED_LINK);
      expect(error.position).toBe(0);
    });
  }

  test('malformed link message shows the collected content', () => {
    expect(inlineError('x [1]').message).toBe('Links must have a URL and a Label separated by a space. Instead found: 1');
  });

  test('unterminated link fails', () => {
    const error = inlineError('x [1 2');
    expect(error.code).toBe(RenderErrorCode.UNCLOSED_LINK);
    expect(error.message).toBe('unclosed link ([) at position: 2');
  });
});

describe('Inline renderer: unclosed controls', () => {
  test('unclosed bold reports its byte offset', () => {
    const error = inlineError('a *unclosed bold');
    expect(error.code).toBe(RenderErrorCode.UNCLOSED_BOLD);
    expect(error.position).toBe(2);
    expect(error.message).toBe('unclosed bold text (*) at position: 2');
  });

  test('unclosed code reports its byte offset', () => {
    const error = inlineError('a `unclosed programmer');
    expect(error.code).toBe(RenderErrorCode.UNCLOSED_INLINE_CODE);
    expect(error.message).toBe('unclosed code text (`) at position: 2');
  });

  test('positions count UTF-8 bytes', () => {
    expect(inlineError('é *x').message).toBe('unclosed bold text (*) at position: 3');
    expect(inlineError('😀`x').message).toBe('unclosed code text (`) at position: 4');
  });

  test('unclosed bold is reported before unclosed code', () => {
    expect(inlineError('*a `b').code).toBe(RenderErrorCode.UNCLOSED_BOLD);
  });

  test('output written before the failure stays in the sink', () => {
    const out = createStringSink();
    expect(() => renderLine('ab *c', out)).toThrow(RenderError);
    expect(out.toString()).toBe('ab <strong>c');
  });
});
