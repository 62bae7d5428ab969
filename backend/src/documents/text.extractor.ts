import { Injectable } from '@nestjs/common';
import * as mammoth from 'mammoth';
import PDFParser from 'pdf2json';

import { ExtractionFailure, describeError } from '../common/errors';
import { ExtractedText, PageBoundary } from './document.types';

export const SUPPORTED_EXTENSIONS = ['pdf', 'txt', 'docx'] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

const safeDecode = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

const singlePage = (text: string): ExtractedText => ({
  text,
  pages: [{ pageNumber: 1, charStart: 0, charEnd: text.length }],
});

/**
 * Joins page texts the way the chunker expects them: each page followed by a newline, with
 * the boundary table pointing at the page's own characters.
 */
export const joinPages = (pageTexts: string[]): ExtractedText => {
  let text = '';
  const pages: PageBoundary[] = [];

  pageTexts.forEach((pageText, index) => {
    text += `${pageText}\n`;
    pages.push({
      pageNumber: index + 1,
      charStart: text.length - pageText.length - 1,
      charEnd: text.length - 1,
    });
  });

  return { text, pages };
};

@Injectable()
export class TextExtractor {
  extensionOf(filename: string): SupportedExtension | null {
    const dot = filename.lastIndexOf('.');
    if (dot < 0) {
      return null;
    }

    const extension = filename.slice(dot + 1).toLowerCase();
    return SUPPORTED_EXTENSIONS.find((candidate) => candidate === extension) ?? null;
  }

  async extract(buffer: Buffer, filename: string): Promise<ExtractedText> {
    const extension = this.extensionOf(filename);
    let extracted: ExtractedText;

    switch (extension) {
      case 'txt':
        extracted = singlePage(buffer.toString('utf-8'));
        break;
      case 'docx':
        extracted = await this.extractDocx(buffer, filename);
        break;
      case 'pdf':
        extracted = joinPages(await this.extractPdfPages(buffer, filename));
        break;
      default:
        throw new ExtractionFailure(`Unsupported file type: ${filename}`, filename);
    }

    if (!extracted.text.trim()) {
      throw new ExtractionFailure(`No text could be extracted from ${filename}`, filename);
    }

    return extracted;
  }

  private async extractDocx(buffer: Buffer, filename: string): Promise<ExtractedText> {
    try {
      const result = await mammoth.extractRawText({ buffer });
      return singlePage(result.value);
    } catch (error) {
      throw new ExtractionFailure(
        `Failed to extract DOCX text from ${filename}: ${describeError(error)}`,
        filename,
      );
    }
  }

  private extractPdfPages(buffer: Buffer, filename: string): Promise<string[]> {
    return new Promise((resolve, reject) => {
      const parser = new PDFParser();

      parser.on('pdfParser_dataError', (errData) => {
        reject(
          new ExtractionFailure(
            `PDF parsing error in ${filename}: ${describeError(errData)}`,
            filename,
          ),
        );
      });

      parser.on('pdfParser_dataReady', (pdfData) => {
        const pageTexts = pdfData.Pages.map((page) => {
          const lines: string[] = [];
          let currentY: number | null = null;

          for (const textItem of page.Texts) {
            const fragment = textItem.R.map((run) => safeDecode(run.T)).join('');
            if (currentY !== null && Math.abs(textItem.y - currentY) <= 0.5) {
              lines[lines.length - 1] += ` ${fragment}`;
            } else {
              lines.push(fragment);
            }
            currentY = textItem.y;
          }

          return lines.join('\n');
        });

        resolve(pageTexts);
      });

      // pdf2json reads the whole backing ArrayBuffer and ignores byteOffset.
      const owned = Buffer.alloc(buffer.length);
      buffer.copy(owned);

      try {
        parser.parseBuffer(owned);
      } catch (error) {
        reject(new ExtractionFailure(`Corrupt PDF ${filename}: ${describeError(error)}`, filename));
      }
    });
  }
}
