import { escapeHtml } from '../html-escape.js';
import { CODE_FENCE, HtmlMarkup } from '../markup.js';
import { createStringSink, type OutputSink } from '../output-sink.js';
import { RenderError, unclosedCodeFence } from '../render-errors.js';
import { renderLine } from './inline-renderer.js';
import { readLines, type RenderInput } from './line-reader.js';

export interface Renderer {
  /** Renders the whole document to out. Throws on the first error. */
  render(input: RenderInput, out: OutputSink): void;

  /** Renders the whole document and returns the HTML. */
  renderToString(input: RenderInput): string;

  /** Renders a single paragraph line without the surrounding <p> markup. */
  renderLine(line: string, out: OutputSink): void;

  /** Fill a zero-allocation diagnostics state object. */
  fillDebugState(state: RendererDebugState): void;
}

/** Block mode - the scanner is either in paragraphs or in a fenced block. */
const enum BlockMode {
  InParagraph = 0,
  InCodeFence = 1,
}

/**
 * Debug state interface for zero-allocation diagnostics
 */
export interface RendererDebugState {
  /** 1-based number of the last line read (0 before any line). */
  line: number;

  /** Human-readable block mode name ('InParagraph' or 'InCodeFence'). */
  mode: string;

  /** Line that opened the current code fence, or -1 outside a fence. */
  fenceOpenLine: number;
}

/**
 * Closure-based renderer. State lives only for the duration of a render call
 * and is kept afterwards for fillDebugState.
 */
export function createRenderer(): Renderer {
  let line = 0;
  let mode: BlockMode = BlockMode.InParagraph;
  let fenceOpenLine = -1;

  function render(input: RenderInput, out: OutputSink): void {
    line = 0;
    mode = BlockMode.InParagraph;
    fenceOpenLine = -1;

    for (const text of readLines(input)) {
      line++;

      if (text === CODE_FENCE) {
        if (mode === BlockMode.InParagraph) {
          mode = BlockMode.InCodeFence;
          fenceOpenLine = line;
          out.write(HtmlMarkup.CODE_BLOCK_START);
        } else {
          mode = BlockMode.InParagraph;
          fenceOpenLine = -1;
          out.write(HtmlMarkup.CODE_BLOCK_END);
        }
      } else if (mode === BlockMode.InCodeFence) {
        out.write(escapeHtml(text));
        out.write(HtmlMarkup.NEWLINE);
      } else if (text.length > 0) {
        out.write(HtmlMarkup.PARAGRAPH_START);
        try {
          renderLine(text, out);
        } catch (error) {
          // Sink failures pass through untouched
          if (error instanceof RenderError) throw error.atLine(line);
          throw error;
        }
        out.write(HtmlMarkup.PARAGRAPH_END);
      }
    }

    if (mode === BlockMode.InCodeFence) throw unclosedCodeFence(fenceOpenLine);
  }

  function renderToString(input: RenderInput): string {
    const sink = createStringSink();
    render(input, sink);
    return sink.toString();
  }

  function fillDebugState(state: RendererDebugState): void {
    state.line = line;
    state.mode = mode === BlockMode.InCodeFence ? 'InCodeFence' : 'InParagraph';
    state.fenceOpenLine = fenceOpenLine;
  }

  return {
    render,
    renderToString,
    renderLine,
    fillDebugState,
  };
}

/** Renders the document to out with a fresh renderer. */
export function render(input: RenderInput, out: OutputSink): void {
  createRenderer().render(input, out);
}

/** Renders the document and returns the HTML. */
export function renderToString(input: RenderInput): string {
  return createRenderer().renderToString(input);
}
