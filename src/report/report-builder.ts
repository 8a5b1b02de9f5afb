/**
 * PDF report of flagged entries.
 *
 * One table row per (entry, tag) pair, in entry order then tag order. A file
 * whose entries carry no tags gets no report at all.
 */

import { rm } from 'node:fs/promises';
import PDFDocument from 'pdfkit';
import { buildArtifactPath, writeFileAtomic } from '../storage/artifacts.ts';
import type { AnnotationResult, TextRecord } from '../types/annotation.ts';
import { ReportRenderError, errorMessage } from '../utils/errors.ts';
import { logEvent } from '../utils/log.ts';

/** One rendered table row. */
export interface ReportRow {
  readonly recordNumber: string;
  readonly literal: string;
  readonly tagLiteral: string;
  readonly description: string;
  readonly source: string;
}

const MM = 72 / 25.4;
const PAGE_MARGIN = 15 * MM;
const COLUMN_WIDTHS = [25 * MM, 60 * MM, 177 * MM] as const;
const COLUMN_HEADERS = ['Record #', 'Literal', 'Tag details'] as const;
const CELL_PADDING = 4;
const FONT_SIZE = 8;
const LINE_GAP = 3;
const TITLE_FONT_SIZE = 16;

const HEADER_BACKGROUND = '#4a4a8a';
const ROW_BACKGROUNDS = ['#ffffff', '#f0f0f8'] as const;
const BORDER_COLOR = '#bfbfbf';
const TEXT_COLOR = '#000000';

/** Fixed so that identical input renders identical bytes. */
const REPORT_CREATION_DATE = new Date(Date.UTC(2000, 0, 1));

/**
 * Splits an input line into its record number and literal at the first comma.
 *
 * @example
 * splitRecordLine("101,The man was aggressive")
 * // => { recordNumber: "101", literal: "The man was aggressive" }
 */
export function splitRecordLine(line: string): { recordNumber: string; literal: string } {
  const comma = line.indexOf(',');
  if (comma === -1) {
    return { recordNumber: line.trim(), literal: '' };
  }
  return {
    recordNumber: line.slice(0, comma).trim(),
    literal: line.slice(comma + 1).trim(),
  };
}

/**
 * Expands a result into report rows.
 *
 * The Record # and Literal columns come from the entry's literal, or from the
 * input record at the entry's index when the service echoed no literal.
 * They repeat on every row of the entry.
 */
export function buildReportRows(
  result: AnnotationResult,
  records: readonly TextRecord[],
): ReportRow[] {
  const textByIndex = new Map(records.map((record) => [record.index, record.text]));
  const rows: ReportRow[] = [];

  for (const entry of result.entries) {
    if (entry.tags.length === 0) continue;

    const line = entry.literal || textByIndex.get(entry.recordIndex) || '';
    const { recordNumber, literal } = splitRecordLine(line);

    for (const tag of entry.tags) {
      rows.push({
        recordNumber,
        literal,
        tagLiteral: tag.literal,
        description: tag.description,
        source: tag.source,
      });
    }
  }

  return rows;
}

/** Text of the Tag details cell. */
export function formatTagDetails(row: ReportRow): string {
  return `Literal: ${row.tagLiteral}\nIssue: ${row.description}\nSource: ${row.source}`;
}

/**
 * Renders the report table to PDF bytes (landscape A4).
 *
 * The header row repeats at the top of every page.
 */
export function renderReportBuffer(title: string, rows: readonly ReportRow[]): Promise<Buffer> {
  const doc = new PDFDocument({
    size: 'A4',
    layout: 'landscape',
    margins: { top: PAGE_MARGIN, bottom: PAGE_MARGIN, left: PAGE_MARGIN, right: PAGE_MARGIN },
    info: {
      Title: title,
      Creator: 'debias-batch-processor',
      Producer: 'debias-batch-processor',
      CreationDate: REPORT_CREATION_DATE,
    },
  });

  const chunks: Buffer[] = [];
  const done = new Promise<Buffer>((resolve, reject) => {
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);
  });

  const tableWidth = COLUMN_WIDTHS.reduce((sum, width) => sum + width, 0);
  const pageBottom = (): number => doc.page.height - PAGE_MARGIN;

  const cellHeight = (cells: readonly string[]): number => {
    const heights = cells.map((cell, i) =>
      doc.heightOfString(cell, { width: COLUMN_WIDTHS[i] - 2 * CELL_PADDING, lineGap: LINE_GAP }),
    );
    return Math.max(...heights) + 2 * CELL_PADDING;
  };

  const drawRow = (cells: readonly string[], top: number, height: number, background: string, color: string): void => {
    doc.rect(PAGE_MARGIN, top, tableWidth, height).fill(background);

    let x = PAGE_MARGIN;
    cells.forEach((cell, i) => {
      doc
        .lineWidth(0.25)
        .strokeColor(BORDER_COLOR)
        .rect(x, top, COLUMN_WIDTHS[i], height)
        .stroke();
      doc
        .fillColor(color)
        .text(cell, x + CELL_PADDING, top + CELL_PADDING, {
          width: COLUMN_WIDTHS[i] - 2 * CELL_PADDING,
          lineGap: LINE_GAP,
        });
      x += COLUMN_WIDTHS[i];
    });
  };

  const drawHeader = (top: number): number => {
    doc.font('Helvetica-Bold').fontSize(FONT_SIZE);
    const height = cellHeight(COLUMN_HEADERS);
    drawRow(COLUMN_HEADERS, top, height, HEADER_BACKGROUND, '#ffffff');
    doc.font('Helvetica').fontSize(FONT_SIZE);
    return top + height;
  };

  doc
    .font('Helvetica-Bold')
    .fontSize(TITLE_FONT_SIZE)
    .fillColor(TEXT_COLOR)
    .text(title, PAGE_MARGIN, PAGE_MARGIN, { width: tableWidth, align: 'center' });

  let y = drawHeader(doc.y + 6 * MM);

  rows.forEach((row, i) => {
    const cells = [row.recordNumber, row.literal, formatTagDetails(row)];
    const height = cellHeight(cells);

    if (y + height > pageBottom()) {
      doc.addPage();
      y = drawHeader(PAGE_MARGIN);
    }

    drawRow(cells, y, height, ROW_BACKGROUNDS[i % 2], TEXT_COLOR);
    y += height;
  });

  doc.end();
  return done;
}

/**
 * Renders the report and writes it to `pdfPath` via a temp file.
 *
 * @throws ReportRenderError on rendering or write failure
 */
export async function renderReport(
  pdfPath: string,
  title: string,
  rows: readonly ReportRow[],
): Promise<void> {
  try {
    const pdf = await renderReportBuffer(title, rows);
    await writeFileAtomic(pdfPath, pdf);
  } catch (error) {
    throw new ReportRenderError(`Cannot write report ${pdfPath}: ${errorMessage(error)}`);
  }
}

/**
 * Builds `{outputRoot}/{baseName}.pdf` if any entry is flagged, and removes
 * an earlier report otherwise.
 *
 * @returns Path and row count of the report, or null when nothing is flagged
 * @throws ReportRenderError if a flagged report cannot be produced
 */
export async function maybeBuildReport(
  outputRoot: string,
  baseName: string,
  result: AnnotationResult,
  records: readonly TextRecord[],
): Promise<{ path: string; rows: number } | null> {
  let pdfPath: string;
  try {
    pdfPath = buildArtifactPath(outputRoot, baseName, 'pdf');
  } catch (error) {
    throw new ReportRenderError(`Cannot build report path for ${baseName}: ${errorMessage(error)}`);
  }

  const rows = buildReportRows(result, records);
  if (rows.length === 0) {
    // A report left by an earlier run would contradict the new result.
    try {
      await rm(pdfPath, { force: true });
    } catch (error) {
      throw new ReportRenderError(`Cannot remove stale report ${pdfPath}: ${errorMessage(error)}`);
    }
    logEvent('debug', 'report_not_needed', { base_name: baseName });
    return null;
  }

  await renderReport(pdfPath, `Annotation report: ${baseName}`, rows);
  logEvent('debug', 'report_written', { base_name: baseName, pdf_path: pdfPath, rows: rows.length });

  return { path: pdfPath, rows: rows.length };
}
