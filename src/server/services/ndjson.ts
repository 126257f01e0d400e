import readline from 'readline';
import type { Readable } from 'stream';
import { MalformedEventError } from '../../shared/errors';

/** Longest slice of an undecodable line kept for diagnostics. */
const MAX_LINE_PREVIEW = 200;

/**
 * Read a newline-delimited JSON stream, yielding one decoded value per line.
 *
 * The game service sends an empty line every few seconds as a keep-alive;
 * blank lines are skipped. A line that is not JSON ends the iteration with a
 * MalformedEventError.
 */
export async function* readNdjson(stream: Readable): AsyncGenerator<unknown, void, undefined> {
  const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }
      let value: unknown;
      try {
        value = JSON.parse(trimmed);
      } catch {
        throw new MalformedEventError('line is not valid JSON', {
          line: trimmed.slice(0, MAX_LINE_PREVIEW),
        });
      }
      yield value;
    }
  } finally {
    lines.close();
  }
}
