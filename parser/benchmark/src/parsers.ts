import { HtmlRenderer, Parser } from 'commonmark';
import MarkdownIt from 'markdown-it';
import { marked } from 'marked';
import { micromark } from 'micromark';
import remarkParse from 'remark-parse';
import { unified } from 'unified';
import { renderToString } from '../../index.js';

export const PARSER_NAMES = ['linemark', 'marked', 'markdown-it', 'micromark', 'commonmark', 'remark'] as const;

export type RenderResult =
  | { outLength: number }
  | { type: string }
  | { error: string };

const mdIt = new MarkdownIt();
const remarkProcessor = unified().use(remarkParse);

/**
 * Runs the named renderer over content. The other renderers read the same text
 * as Markdown; the comparison is of throughput, not of output.
 */
export async function renderWithParser(name: string, content: string): Promise<RenderResult> {
  switch (name) {
    case 'linemark': {
      return { outLength: renderToString(content).length };
    }
    case 'marked': {
      const html = await marked.parse(content);
      return { outLength: html.length };
    }
    case 'markdown-it': {
      return { outLength: mdIt.render(content).length };
    }
    case 'micromark': {
      return { outLength: micromark(content).length };
    }
    case 'commonmark': {
      const parsed = new Parser().parse(content);
      return { outLength: new HtmlRenderer().render(parsed).length };
    }
    case 'remark': {
      const tree = remarkProcessor.parse(content);
      return { type: tree.type };
    }
    default:
      return { error: 'unknown parser' };
  }
}
