import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";

import { DocumentFailure, errorMessage } from "@/lib/errors";
import type { RawTable } from "@/lib/tableClassifier";
import type { DocumentSource } from "@/lib/types";

export type PositionedText = {
  str: string;
  x: number;
  y: number;
  width: number;
};

export type LayoutCell = {
  text: string;
  x: number;
};

export type LayoutLine = {
  y: number;
  cells: LayoutCell[];
};

export type PdfPageLayout = {
  pageNumber: number;
  lines: LayoutLine[];
};

const LINE_TOLERANCE = 3;
const COLUMN_GAP = 12;
const WORD_GAP = 1;
const COLUMN_SNAP = 8;

/** Groups text runs into lines (top to bottom) and splits each line into cells on wide gaps. */
export function layoutLines(items: readonly PositionedText[]): LayoutLine[] {
  const runs = items.filter((i) => i.str.trim()).sort((a, b) => b.y - a.y || a.x - b.x);
  const rows: PositionedText[][] = [];
  for (const run of runs) {
    const row = rows[rows.length - 1];
    const anchor = row?.[0];
    if (row && anchor && Math.abs(anchor.y - run.y) <= LINE_TOLERANCE) row.push(run);
    else rows.push([run]);
  }

  return rows.map((row) => {
    const sorted = [...row].sort((a, b) => a.x - b.x);
    const cells: LayoutCell[] = [];
    let end = Number.NEGATIVE_INFINITY;
    for (const run of sorted) {
      const gap = run.x - end;
      const last = cells[cells.length - 1];
      if (last && gap <= COLUMN_GAP) {
        last.text = gap > WORD_GAP && !last.text.endsWith(" ") ? `${last.text} ${run.str}` : `${last.text}${run.str}`;
      } else {
        cells.push({ text: run.str, x: run.x });
      }
      end = Math.max(end, run.x + run.width);
    }
    return {
      y: sorted[0]?.y ?? 0,
      cells: cells.map((c) => ({ ...c, text: c.text.replace(/\s+/g, " ").trim() })).filter((c) => c.text),
    };
  });
}

export function linesToText(lines: readonly LayoutLine[]): string {
  return lines.map((l) => l.cells.map((c) => c.text).join(" ")).join("\n");
}

function alignToHeader(header: readonly LayoutCell[], line: LayoutLine): string[] {
  const out = header.map(() => "");
  for (const cell of line.cells) {
    let column = 0;
    header.forEach((h, i) => {
      if (h.x <= cell.x + COLUMN_SNAP) column = i;
    });
    out[column] = out[column] ? `${out[column]} ${cell.text}` : cell.text;
  }
  return out;
}

/**
 * A table is a run of at least two consecutive lines with two or more cells. The first line is
 * the header; data cells are placed under the header column that starts at or left of them.
 */
export function detectTablesInLines(lines: readonly LayoutLine[]): RawTable[] {
  const tables: RawTable[] = [];
  let run: LayoutLine[] = [];

  const flush = () => {
    const [header, ...rest] = run;
    if (header && rest.length) {
      tables.push({
        headerRow: header.cells.map((c) => c.text),
        dataRows: rest.map((line) => alignToHeader(header.cells, line)),
      });
    }
    run = [];
  };

  for (const line of lines) {
    if (line.cells.length >= 2) run.push(line);
    else flush();
  }
  flush();
  return tables;
}

/** Loads a PDF with pdfjs and exposes its pages as positioned-text layouts. */
export async function loadPdf(bytes: Uint8Array): Promise<DocumentSource<PdfPageLayout>> {
  let pdf: Awaited<ReturnType<typeof getDocument>["promise"]>;
  try {
    // pdfjs takes ownership of the buffer it is given.
    pdf = await getDocument({ data: new Uint8Array(bytes), isEvalSupported: false, verbosity: 0 }).promise;
  } catch (err) {
    throw new DocumentFailure(`Unreadable PDF: ${errorMessage(err)}`);
  }

  return {
    pages: {
      pageCount: pdf.numPages,
      async page(pageNumber) {
        const page = await pdf.getPage(pageNumber);
        const content = await page.getTextContent();
        const items: PositionedText[] = [];
        for (const item of content.items) {
          if (!("str" in item)) continue;
          items.push({
            str: item.str,
            x: Number(item.transform[4]),
            y: Number(item.transform[5]),
            width: item.width,
          });
        }
        page.cleanup();
        return { pageNumber, lines: layoutLines(items) };
      },
      async close() {
        await pdf.destroy();
      },
    },
    async detectTables(layout) {
      return detectTablesInLines(layout.lines);
    },
    async extractText(layout) {
      return linesToText(layout.lines);
    },
  };
}
