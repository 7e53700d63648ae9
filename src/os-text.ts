/**
 * Official statement text, one string per page
 *
 * Reads a downloaded PDF from disk, or fetches it when the location is an
 * http(s) URL, and extracts the text layer with pdf-parse.
 */

import fs from 'fs/promises';
import axios from 'axios';
import { PDFParse } from 'pdf-parse';
import { config } from './config.js';
import { DocumentLoadError, errorMessage } from './errors.js';

export interface DocumentTextSource {
  loadPages(location: string): Promise<string[]>;
}

export function isPdf(buffer: Buffer): boolean {
  return buffer.subarray(0, 5).toString() === '%PDF-';
}

export async function pdfPages(buffer: Buffer): Promise<string[]> {
  const parser = new PDFParse({ data: new Uint8Array(buffer) });
  try {
    const result = await parser.getText();
    return result.pages.map(p => p.text);
  } finally {
    await parser.destroy();
  }
}

export class PdfTextSource implements DocumentTextSource {
  constructor(private readonly timeoutMs: number = config.pdf.downloadTimeoutMs) {}

  async loadPages(location: string): Promise<string[]> {
    const buffer = await this.readBuffer(location);

    if (!isPdf(buffer)) {
      throw new DocumentLoadError(location, 'not a PDF file');
    }

    try {
      return await pdfPages(buffer);
    } catch (e) {
      throw new DocumentLoadError(location, `text extraction failed: ${errorMessage(e)}`);
    }
  }

  private async readBuffer(location: string): Promise<Buffer> {
    try {
      if (/^https?:\/\//i.test(location)) {
        const response = await axios.get<ArrayBuffer>(location, {
          responseType: 'arraybuffer',
          timeout: this.timeoutMs,
          maxRedirects: 5,
          headers: { 'User-Agent': 'Mozilla/5.0' },
        });
        return Buffer.from(response.data);
      }
      return await fs.readFile(location);
    } catch (e) {
      throw new DocumentLoadError(location, errorMessage(e));
    }
  }
}
