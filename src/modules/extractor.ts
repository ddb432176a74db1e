/**
 * Extractor Module
 * Pulls the text layer out of a transcript PDF, one string per page
 */

import { readFile } from "fs/promises";
import { createRequire } from "node:module";
import { pathToFileURL } from "node:url";
import {
  getDocument,
  GlobalWorkerOptions,
} from "pdfjs-dist/legacy/build/pdf.mjs";
import { ExtractionError } from "../utils";

export interface TextExtractor {
  /**
   * Page texts joined by newlines; pages without text are left out
   */
  extract(path: string): Promise<string>;
}

const configurePdfJsWorker = (): void => {
  if (GlobalWorkerOptions.workerSrc) {
    return;
  }
  const require = createRequire(import.meta.url);
  const workerPath = require.resolve("pdfjs-dist/legacy/build/pdf.worker.mjs");
  GlobalWorkerOptions.workerSrc = pathToFileURL(workerPath).href;
};

/**
 * Join the text items of one page, breaking lines where pdf.js marks an
 * end of line
 */
export function pageItemsToText(items: readonly object[]): string {
  let text = "";
  for (const item of items) {
    if (!("str" in item) || typeof item.str !== "string") {
      continue;
    }
    text += item.str;
    if ("hasEOL" in item && item.hasEOL === true) {
      text += "\n";
    }
  }
  return text.trimEnd();
}

export class PdfTextExtractor implements TextExtractor {
  async extract(path: string): Promise<string> {
    let data: Uint8Array;
    try {
      data = new Uint8Array(await readFile(path));
    } catch (error) {
      throw new ExtractionError(path, error);
    }

    configurePdfJsWorker();
    const loadingTask = getDocument({
      data,
      useSystemFonts: true,
      disableFontFace: true,
      verbosity: 0,
    });

    try {
      const document = await loadingTask.promise;
      const pages: string[] = [];

      for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
        const page = await document.getPage(pageNumber);
        const textContent = await page.getTextContent();
        const text = pageItemsToText(textContent.items);
        if (text) {
          pages.push(text);
        }
      }

      return pages.join("\n");
    } catch (error) {
      throw new ExtractionError(path, error);
    } finally {
      await loadingTask.destroy();
    }
  }
}
