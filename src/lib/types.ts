import type { RawTable } from "@/lib/tableClassifier";

/** Random access to the pages of one loaded document. Page numbers are 1-based. */
export type DocumentPages<P> = {
  pageCount: number;
  page(pageNumber: number): Promise<P>;
  close(): Promise<void>;
};

export type TableDetector<P> = (page: P) => Promise<RawTable[]>;

export type TextExtractor<P> = (page: P) => Promise<string>;

export type DocumentSource<P> = {
  pages: DocumentPages<P>;
  detectTables(page: P): Promise<RawTable[]>;
  extractText(page: P): Promise<string>;
};

export function documentSource<P>(
  pages: DocumentPages<P>,
  detectTables: TableDetector<P>,
  extractText: TextExtractor<P>,
): DocumentSource<P> {
  return { pages, detectTables, extractText };
}

/** Turns stored bytes into a page source; throws DocumentFailure when the bytes cannot be read. */
export type DocumentLoader = (bytes: Uint8Array) => Promise<DocumentSource<unknown>>;
