/**
 * PDF page text extraction with pdfjs-dist
 *
 * Text items are grouped into lines by baseline, lines are ordered top to
 * bottom and items left to right.
 *
 * @module services/ingestion/pdf-text
 */

import { readFile } from 'fs/promises';

import type { ExtractedPage } from '../../models/page.js';
import { IngestionError } from './errors.js';

export interface PageTextExtractor {
  /** Text of every page, 1-based page numbers */
  extractPages(filePath: string): Promise<ExtractedPage[]>;

  /** Text of the first `count` pages */
  samplePages(filePath: string, count: number): Promise<string[]>;
}

interface PositionedText {
  str: string;
  x: number;
  y: number;
  width: number;
}

/** Baselines closer than this (in points) share a line */
const LINE_TOLERANCE = 3;

/** Horizontal gap (in points) that gets a separating space */
const WORD_GAP = 1.5;

/**
 * Join positioned text items into page text
 */
export function layoutPageText(items: readonly PositionedText[]): string {
  const lines: Array<{ y: number; items: PositionedText[] }> = [];

  for (const item of items) {
    if (!item.str) continue;
    let line = lines.find((candidate) => Math.abs(candidate.y - item.y) <= LINE_TOLERANCE);
    if (!line) {
      line = { y: item.y, items: [] };
      lines.push(line);
    }
    line.items.push(item);
  }

  // PDF origin is bottom-left
  lines.sort((a, b) => b.y - a.y);

  return lines
    .map((line) => {
      const sorted = [...line.items].sort((a, b) => a.x - b.x);
      let text = '';
      let prevRight: number | null = null;
      for (const item of sorted) {
        const str = item.str.replace(/\u00A0/g, ' ');
        const gap = prevRight === null ? 0 : item.x - prevRight;
        if (gap > WORD_GAP && !text.endsWith(' ') && !str.startsWith(' ')) {
          text += ' ';
        }
        text += str;
        prevRight = item.x + item.width;
      }
      return text;
    })
    .join('\n');
}

export class PdfJsTextExtractor implements PageTextExtractor {
  async extractPages(filePath: string): Promise<ExtractedPage[]> {
    const texts = await this.readPages(filePath);
    return texts.map((rawText, index) => ({
      page_num: index + 1,
      raw_text: rawText,
      text_length: rawText.length,
    }));
  }

  async samplePages(filePath: string, count: number): Promise<string[]> {
    return this.readPages(filePath, count);
  }

  private async readPages(filePath: string, limit?: number): Promise<string[]> {
    let data: Uint8Array;
    try {
      data = new Uint8Array(await readFile(filePath));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new IngestionError(`Cannot read PDF: ${message}`, 'FILE_NOT_FOUND', filePath);
    }

    const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

    const doc = await pdfjs
      .getDocument({ data, isEvalSupported: false, useSystemFonts: true })
      .promise.catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        throw new IngestionError(`Invalid PDF: ${message}`, 'PDF_READ_ERROR', filePath);
      });

    try {
      const pageCount = limit === undefined ? doc.numPages : Math.min(limit, doc.numPages);
      const texts: string[] = [];
      for (let pageNum = 1; pageNum <= pageCount; pageNum++) {
        const page = await doc.getPage(pageNum);
        const content = await page.getTextContent();
        const items: PositionedText[] = [];
        for (const item of content.items) {
          if (!('str' in item)) continue;
          items.push({
            str: item.str,
            x: Number(item.transform[4] ?? 0),
            y: Number(item.transform[5] ?? 0),
            width: Number(item.width),
          });
        }
        texts.push(layoutPageText(items));
        page.cleanup();
      }
      return texts;
    } finally {
      await doc.destroy();
    }
  }
}
