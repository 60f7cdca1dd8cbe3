/**
 * Input Source - reads the whole input as lines
 *
 * A file path or stdin (no path, or "-"). Lines are materialized because bin
 * edges depend on the global min/max.
 */

import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { NotFoundError, ValidationError } from '@asciihist/utils';

export type InputSource = { kind: 'stdin' } | { kind: 'file'; path: string };

export function resolveInputSource(file: string | undefined): InputSource {
  if (file === undefined || file === '-') {
    return { kind: 'stdin' };
  }
  return { kind: 'file', path: file };
}

export function describeInputSource(source: InputSource): string {
  return source.kind === 'stdin' ? 'stdin' : source.path;
}

async function assertReadableFile(path: string): Promise<void> {
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      throw new ValidationError(`Input path is not a file: ${path}`, { path });
    }
  } catch (error) {
    if (error instanceof ValidationError) throw error;
    throw new NotFoundError('Input file', path, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Read up to maxLines lines from a stream, stopping early once the cap is hit.
 */
export async function readLines(
  input: NodeJS.ReadableStream,
  maxLines: number = Number.POSITIVE_INFINITY
): Promise<string[]> {
  const rl = createInterface({
    input,
    crlfDelay: Number.POSITIVE_INFINITY,
  });

  const lines: string[] = [];
  try {
    for await (const line of rl) {
      if (lines.length >= maxLines) break;
      lines.push(line);
    }
  } finally {
    rl.close();
  }
  return lines;
}

/**
 * Read every line of the source.
 *
 * @throws NotFoundError when a file source does not exist
 */
export async function readInputLines(
  source: InputSource,
  stdin: NodeJS.ReadableStream,
  maxLines?: number
): Promise<string[]> {
  if (source.kind === 'stdin') {
    return readLines(stdin, maxLines);
  }

  await assertReadableFile(source.path);
  const stream = createReadStream(source.path, 'utf-8');
  try {
    return await readLines(stream, maxLines);
  } finally {
    stream.destroy();
  }
}
