export type TextChunkDraft = {
  pageNumber: number;
  chunkIndex: number;
  text: string;
};

export type ChunkOptions = {
  chunkSize: number;
  chunkOverlap: number;
};

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = { chunkSize: 1000, chunkOverlap: 200 };

/**
 * Splits one page of prose into overlapping windows.
 *
 * A window that does not reach the end of the text is cut back to its last period or newline
 * when that boundary lies past half the window. `startIndex` continues the running chunk
 * index across pages.
 */
export function chunkPageText(
  text: string,
  pageNumber: number,
  startIndex: number,
  options: ChunkOptions = DEFAULT_CHUNK_OPTIONS,
): TextChunkDraft[] {
  const { chunkSize, chunkOverlap } = options;
  if (chunkSize <= 0) throw new Error("chunkSize must be positive");
  if (chunkOverlap < 0 || chunkOverlap >= chunkSize) throw new Error("chunkOverlap must be in [0, chunkSize)");

  const source = text.trim();
  const chunks: TextChunkDraft[] = [];
  let chunkIndex = startIndex;
  let start = 0;

  while (start < source.length) {
    let end = Math.min(start + chunkSize, source.length);
    if (end < source.length) {
      const window = source.slice(start, end);
      const breakAt = Math.max(window.lastIndexOf("."), window.lastIndexOf("\n"));
      if (breakAt > chunkSize * 0.5) end = start + breakAt + 1;
    }

    const piece = source.slice(start, end).trim();
    if (piece) {
      chunks.push({ pageNumber, chunkIndex, text: piece });
      chunkIndex += 1;
    }

    if (end >= source.length) break;
    start = Math.max(end - chunkOverlap, start + 1);
  }

  return chunks;
}
