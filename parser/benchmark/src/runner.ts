import { performance } from 'node:perf_hooks';
import { DATASET_NAMES, getDataset } from './datasets.js';
import { PARSER_NAMES, renderWithParser, type RenderResult } from './parsers.js';

export interface BenchmarkOptions {
  parsers: string[];
  datasets: string[];
  iterations: number;
}

export interface Measurement {
  parser: string;
  dataset: string;
  renderTimeMs: number;
  memoryDelta: number;
  result: RenderResult;
}

const DEFAULT_ITERATIONS = 5;

/** Reads --only-parser=, --only-dataset= and --iterations= flags. */
export function parseBenchmarkArgs(argv: string[]): BenchmarkOptions {
  const valueOf = (flag: string) => {
    const arg = argv.find(a => a.startsWith(flag + '='));
    return arg ? arg.substring(flag.length + 1) : undefined;
  };

  const onlyParser = valueOf('--only-parser');
  const onlyDataset = valueOf('--only-dataset');
  const iterationsArg = valueOf('--iterations');
  const iterations = iterationsArg === undefined ? DEFAULT_ITERATIONS : Number.parseInt(iterationsArg, 10);
  if (!Number.isInteger(iterations) || iterations < 1)
    throw new Error(`--iterations must be a positive integer, got: ${iterationsArg}`);

  return {
    parsers: onlyParser ? [onlyParser] : [...PARSER_NAMES],
    datasets: onlyDataset ? [onlyDataset] : [...DATASET_NAMES],
    iterations
  };
}

export async function measure(parser: string, dataset: string, content: string): Promise<Measurement> {
  const memBefore = process.memoryUsage().heapUsed;
  const t0 = performance.now();

  const result = await renderWithParser(parser, content);

  const t1 = performance.now();
  const memAfter = process.memoryUsage().heapUsed;

  return { parser, dataset, renderTimeMs: t1 - t0, memoryDelta: memAfter - memBefore, result };
}

/** Average after dropping the fastest and slowest sample, when there are enough. */
export function trimmedAverage(times: number[]): number | undefined {
  if (!times.length) return undefined;
  const sorted = [...times].sort((a, b) => a - b);
  const trimmed = sorted.length >= 3 ? sorted.slice(1, sorted.length - 1) : sorted;
  return trimmed.reduce((a, b) => a + b, 0) / trimmed.length;
}

function pad(s: string, width: number) { return s.length >= width ? s : s + ' '.repeat(width - s.length); }

function describeResult(result: RenderResult): string {
  if ('outLength' in result) return String(result.outLength);
  if ('type' in result) return result.type;
  return result.error;
}

export async function runBenchmark(argv: string[]): Promise<void> {
  const options = parseBenchmarkArgs(argv);

  const headers = ['Parser', 'Avg ms', 'Memory Δ', 'Output'];
  const parserColWidth = Math.max(...options.parsers.map(p => p.length), headers[0].length) + 2;
  const numColWidth = 12;
  const totalWidth = parserColWidth + numColWidth * 3;

  console.log(pad(headers[0], parserColWidth) + pad(headers[1], numColWidth) + pad(headers[2], numColWidth) + headers[3]);
  console.log('-'.repeat(totalWidth));

  for (const datasetName of options.datasets) {
    const { content } = getDataset(datasetName);
    const label = `== ${datasetName} (${Buffer.byteLength(content)} bytes) `;
    console.log(label + '='.repeat(Math.max(0, totalWidth - label.length)));

    for (const parser of options.parsers) {
      const samples: Measurement[] = [];
      for (let iter = 0; iter < options.iterations; iter++) {
        samples.push(await measure(parser, datasetName, content));
      }

      const avg = trimmedAverage(samples.map(m => m.renderTimeMs));
      const last = samples[samples.length - 1];
      console.log(
        pad(parser, parserColWidth) +
        pad(avg === undefined ? '' : avg.toFixed(2), numColWidth) +
        pad(String(last.memoryDelta), numColWidth) +
        describeResult(last.result));
    }
  }
}
