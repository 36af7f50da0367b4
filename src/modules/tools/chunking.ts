export interface TextChunk {
  sequence: number;
  data: string;
  /** UTF-8 byte offset of the chunk in the file text */
  start_index: number;
  /** Exclusive UTF-8 byte offset */
  end_index: number;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Move a string index back by one when it falls between the two halves of a surrogate pair
 */
export function codePointBoundary(text: string, index: number): number {
  if (index <= 0 || index >= text.length) return index;
  return isHighSurrogate(text.charCodeAt(index - 1)) && isLowSurrogate(text.charCodeAt(index))
    ? index - 1
    : index;
}

/**
 * Leading part of text no longer than maxLength code units, never splitting a code point
 */
export function truncateText(text: string, maxLength: number): string {
  return text.slice(0, codePointBoundary(text, maxLength));
}

/**
 * Split text into chunks of at most chunkSize characters. A chunk ends at the
 * last whitespace in its window when that lies in the second half of it, and
 * never inside a surrogate pair.
 */
export function splitIntoChunks(text: string, chunkSize: number): TextChunk[] {
  if (chunkSize <= 0) {
    throw new RangeError('chunkSize must be positive');
  }

  const chunks: TextChunk[] = [];
  let start = 0;
  let byteStart = 0;
  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);
    if (end < text.length) {
      const window = text.slice(start, end);
      const breakAt = Math.max(window.lastIndexOf(' '), window.lastIndexOf('\n'));
      if (breakAt >= Math.floor(chunkSize / 2)) {
        end = start + breakAt + 1;
      }
      end = codePointBoundary(text, end);
      if (end <= start) {
        // A window of one code unit on a surrogate pair takes the whole pair
        end = start + 2;
      }
    }

    const data = text.slice(start, end);
    const byteEnd = byteStart + Buffer.byteLength(data, 'utf8');
    if (data.trim().length > 0) {
      chunks.push({ sequence: chunks.length, data, start_index: byteStart, end_index: byteEnd });
    }
    start = end;
    byteStart = byteEnd;
  }
  return chunks;
}
