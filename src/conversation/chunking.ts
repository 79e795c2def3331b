/** Discord's per-message character limit */
export const MAX_MESSAGE_LENGTH = 2000;

/**
 * Split text into consecutive chunks of at most `size` UTF-16 units. A chunk
 * ends one unit early rather than split a surrogate pair. Joining the chunks
 * gives back the input.
 */
export function splitIntoChunks(text: string, size = MAX_MESSAGE_LENGTH): string[] {
  if (size < 1) {
    throw new RangeError(`Chunk size must be positive, got ${String(size)}`);
  }

  const chunks: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + size, text.length);
    // Don't split a surrogate pair across messages
    if (end < text.length && end - start > 1 && isHighSurrogate(text.charCodeAt(end - 1))) {
      end -= 1;
    }
    chunks.push(text.slice(start, end));
    start = end;
  }
  return chunks;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
