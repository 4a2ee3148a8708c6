import { readFile } from "node:fs/promises";
import { createSilentLogger, type Logger } from "@docsage/logger";
import type { ILoader, LoadedText } from "./loader.interface.js";

/**
 * Page-level view of an opened PDF. Page numbers are 1-based.
 */
export interface PdfPages {
  readonly pageCount: number;
  pageText(pageNumber: number): Promise<string>;
  close(): Promise<void>;
}

export type PdfOpener = (data: Uint8Array) => Promise<PdfPages>;

interface PdfTextItem {
  str: string;
  hasEOL?: boolean;
}

function isTextItem(item: object): item is PdfTextItem {
  return "str" in item && typeof item.str === "string";
}

/**
 * Opens a PDF with pdfjs-dist. The legacy build is the one that runs under
 * Node; it is imported lazily so text-only corpora never load it.
 */
export const openWithPdfjs: PdfOpener = async (data) => {
  const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
  const document = await pdfjs.getDocument({
    data,
    useSystemFonts: true,
    isEvalSupported: false,
  }).promise;

  return {
    pageCount: document.numPages,
    async pageText(pageNumber) {
      const page = await document.getPage(pageNumber);
      const content = await page.getTextContent();
      let text = "";
      for (const item of content.items) {
        if (isTextItem(item)) {
          text += item.str + (item.hasEOL === true ? "\n" : "");
        }
      }
      page.cleanup();
      return text;
    },
    async close() {
      await document.destroy();
    },
  };
};

/**
 * Paginated-document loader. Concatenates the text of every page in order,
 * one newline between pages; pages without extractable text (scanned
 * images) are skipped.
 */
export class PdfLoader implements ILoader {
  readonly format = "pdf";
  readonly supportedExtensions = [".pdf"];
  private readonly open: PdfOpener;
  private readonly logger: Logger;

  constructor(open: PdfOpener = openWithPdfjs, logger: Logger = createSilentLogger()) {
    this.open = open;
    this.logger = logger;
  }

  async load(path: string): Promise<LoadedText> {
    const bytes = await readFile(path);
    const pdf = await this.open(new Uint8Array(bytes));

    const pages: string[] = [];
    try {
      for (let pageNumber = 1; pageNumber <= pdf.pageCount; pageNumber++) {
        const text = await pdf.pageText(pageNumber);
        if (text.trim().length > 0) {
          pages.push(text);
        }
      }
    } catch (error: unknown) {
      // The extraction error is the one to report; a close failure is only logged.
      try {
        await pdf.close();
      } catch (closeError: unknown) {
        this.logger.error({ path, err: closeError }, "Failed to close PDF");
      }
      throw error;
    }

    await pdf.close();
    return { text: pages.join("\n"), pageCount: pdf.pageCount };
  }
}
