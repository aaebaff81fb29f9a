import { writeSync } from 'node:fs';

/**
 * Synchronous destination for rendered HTML. A sink that cannot accept a
 * chunk throws; the error reaches the caller of the render unchanged.
 */
export interface OutputSink {
  write(chunk: string): void;
}

export interface StringSink extends OutputSink {
  toString(): string;
}

export function createStringSink(): StringSink {
  const parts: string[] = [];

  return {
    write(chunk: string) {
      parts.push(chunk);
    },
    toString() {
      return parts.length === 1 ? parts[0] : parts.join('');
    }
  };
}

/** Writes UTF-8 straight to an open file descriptor (e.g. 1 for stdout). */
export function createFileDescriptorSink(fd: number): OutputSink {
  return {
    write(chunk: string) {
      writeSync(fd, chunk, null, 'utf8');
    }
  };
}
