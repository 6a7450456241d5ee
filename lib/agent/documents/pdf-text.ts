/**
 * PDF text extraction with pdfjs-dist (legacy build runs on Node).
 */

import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { TextExtractor } from "../collaborators";

export class PdfTextExtractor implements TextExtractor {
  /** Page texts joined by newlines; pages without text are skipped. */
  async extract(document: Uint8Array): Promise<string> {
    // pdfjs takes ownership of the buffer it is given.
    const loadingTask = getDocument({
      data: new Uint8Array(document),
      isEvalSupported: false,
      useSystemFonts: true,
    });
    const pdf = await loadingTask.promise;

    try {
      let fullText = "";
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        const page = await pdf.getPage(pageNumber);
        const content = await page.getTextContent();
        const pageText = content.items
          .map((item) => ("str" in item ? item.str + (item.hasEOL ? "\n" : " ") : ""))
          .join("")
          .trim();
        if (pageText) fullText += pageText + "\n";
        page.cleanup();
      }
      return fullText;
    } finally {
      await pdf.destroy();
    }
  }
}
