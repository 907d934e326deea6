/**
 * Document Loader
 *
 * Opens a PDF with the pdfjs legacy build (the one that runs under Node)
 * and extracts the blocks of each requested page. Block ids continue from
 * page to page, so they are unique across the whole document.
 */

import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PageData } from '../model/types';
import { extractPage } from './PageExtractor';

export interface LoadOptions {
  /** 1-based page numbers to extract; all pages when omitted */
  pages?: readonly number[];
}

export interface LoadedDocument {
  numPages: number;
  pages: PageData[];
}

export async function loadDocument(data: Uint8Array, options: LoadOptions = {}): Promise<LoadedDocument> {
  // pdfjs takes ownership of the buffer it is given
  const doc = await getDocument({ data: data.slice(), isEvalSupported: false }).promise;
  try {
    const wanted =
      options.pages ?? Array.from({ length: doc.numPages }, (_, i) => i + 1);

    const pages: PageData[] = [];
    let nextId = 0;
    for (const pageNumber of wanted) {
      if (pageNumber < 1 || pageNumber > doc.numPages) {
        throw new RangeError(`Page ${pageNumber} is out of range (1-${doc.numPages})`);
      }
      const page = await doc.getPage(pageNumber);
      const extracted = await extractPage(page, pageNumber, nextId);
      pages.push(extracted.pageData);
      nextId = extracted.nextId;
      page.cleanup();
    }

    return { numPages: doc.numPages, pages };
  } finally {
    await doc.destroy();
  }
}
