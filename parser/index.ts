export { createRenderer, render, renderToString } from './scanner/block-scanner.js';
export type { Renderer, RendererDebugState } from './scanner/block-scanner.js';
export { renderLine } from './scanner/inline-renderer.js';
export { readLines } from './scanner/line-reader.js';
export type { RenderInput } from './scanner/line-reader.js';

export * from './html-escape.js';
export * from './markup.js';
export * from './output-sink.js';
export * from './render-errors.js';
