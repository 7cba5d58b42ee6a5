export type ChunkOptions = {
  chunkSize: number;
  overlap: number;
};

const SENTENCE_TERMINATOR = ". ";
const BOUNDARY_SEARCH_CHARS = 1000;

function assertChunkOptions({ chunkSize, overlap }: ChunkOptions): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new RangeError(`overlap must be an integer in [0, chunkSize), got ${overlap} (chunkSize=${chunkSize})`);
  }
}

/**
 * Picks where the chunk starting at `cursor` ends: just after the last ". " in the
 * trailing search window, or exactly `cursor + chunkSize` when there is none.
 */
function findChunkEnd(text: string, cursor: number, { chunkSize, overlap }: ChunkOptions): number {
  const tentativeEnd = cursor + chunkSize;
  const windowStart = Math.max(cursor, tentativeEnd - BOUNDARY_SEARCH_CHARS);

  const boundary = text.lastIndexOf(SENTENCE_TERMINATOR, tentativeEnd - SENTENCE_TERMINATOR.length);
  if (boundary < windowStart || boundary <= cursor) {
    return tentativeEnd;
  }

  const end = boundary + 1;
  // the next cursor (end - overlap) has to move forward
  return end - overlap > cursor ? end : tentativeEnd;
}

function* walkChunks(text: string, options: ChunkOptions): Generator<string, void, undefined> {
  let cursor = 0;

  while (cursor < text.length) {
    if (text.length - cursor <= options.chunkSize) {
      yield text.slice(cursor);
      return;
    }

    const end = findChunkEnd(text, cursor, options);
    yield text.slice(cursor, end);
    cursor = end - options.overlap;
  }
}

/**
 * Lazily splits `text` into overlapping windows that prefer to end on sentence boundaries.
 * Each iteration walks the text from the start again.
 */
export function chunkText(text: string, options: ChunkOptions): Iterable<string> {
  assertChunkOptions(options);
  return {
    [Symbol.iterator]: () => walkChunks(text, options),
  };
}

export function splitIntoChunks(text: string, options: ChunkOptions): string[] {
  return Array.from(chunkText(text, options));
}
