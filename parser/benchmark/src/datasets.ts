export interface Dataset {
  name: string;
  content: string;
}

export const DATASET_NAMES = ['small-simple', 'medium', 'code-heavy', 'links-heavy'] as const;

const WORDS = ['lorem', 'ipsum', 'dolor', 'sit', 'amet', 'alpha', 'beta', 'gamma', 'delta', 'example',
  'paragraph', 'fence', 'scanner', 'renderer', 'benchmark', 'node', 'typescript', 'markup', 'format', 'line'];

/** Deterministic LCG so repeated runs see identical documents. */
function createRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (1103515245 * state + 12345) >>> 0;
    return state;
  };
}

function generate(seed: number, targetBytes: number, pick: (next: () => number, words: string[]) => string): string {
  const next = createRandom(seed);
  const chunks: string[] = [];
  let size = 0;
  while (size < targetBytes) {
    const wcount = (next() % 30) + 5;
    const words: string[] = [];
    for (let i = 0; i < wcount; i++) words.push(WORDS[next() % WORDS.length]);
    const chunk = pick(next, words);
    chunks.push(chunk);
    size += Buffer.byteLength(chunk) + 2;
  }
  return chunks.join('\n\n');
}

function boldAndCode(words: string[]): string {
  return words.map((w, i) => i % 7 === 3 ? '*' + w + '*' : i % 5 === 1 ? '`' + w + '`' : w).join(' ');
}

/**
 * Documents contain only constructs the renderer accepts: paragraphs, fenced
 * blocks, bold, inline code, links and escapes. Unknown names are empty.
 */
export function getDataset(name: string): Dataset {
  if (name === 'small-simple') return { name, content: 'Hello *world*\n\nThis is a `small` document.' };

  if (name === 'medium') {
    // ~512 KiB of mixed content
    const content = generate(12345, 512 * 1024, (next, words) => {
      const r = next() % 100;
      if (r < 15) return '```\n' + words.join(' ') + '\n' + words.join(' ') + '\n```';
      if (r < 35) return boldAndCode(words);
      if (r < 45) return words.join(' ') + ' [https://example.com/' + (next() % 10000) + ' ' + words[0] + ' ' + words[1] + ']';
      if (r < 50) return words.join(' ') + ' \\* \\[ \\`';
      return words.join(' ');
    });
    return { name, content };
  }

  if (name === 'code-heavy') {
    // ~256 KiB dominated by fenced blocks holding characters that need escaping
    const content = generate(13579, 256 * 1024, (next, words) => {
      if (next() % 4 === 0) return words.map(w => '`' + w + '`').join(' ');
      const body: string[] = [];
      for (let i = 0; i < 4; i++) body.push('if (a < b && c > "' + words[i % words.length] + '") *p = \'x\';');
      return '```\n' + body.join('\n') + '\n```';
    });
    return { name, content };
  }

  if (name === 'links-heavy') {
    // ~256 KiB of paragraphs made mostly of links
    const content = generate(424242, 256 * 1024, (next, words) => {
      const links: string[] = [];
      for (let i = 0; i + 1 < words.length; i += 2) {
        links.push('[https://example.com/' + words[i] + '?id=' + (next() % 1000) + ' ' + words[i + 1] + ' <' + i + '>]');
      }
      return links.join(' ');
    });
    return { name, content };
  }

  return { name, content: '' };
}
