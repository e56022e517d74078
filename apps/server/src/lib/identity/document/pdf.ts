import * as fs from "node:fs/promises";
import * as path from "node:path";

import { pdfToPng } from "pdf-to-png-converter";

import { withTempDir } from "@/lib/storage/temp-dir";

export type RasterizeOutcome =
  | { status: "ok"; pages: Buffer[] }
  | { status: "failed"; reason: string };

/**
 * Renders PDF pages to PNG images.
 */
export interface PdfRasterizer {
  rasterize(
    pdf: Buffer,
    options: { maxPages: number },
  ): Promise<RasterizeOutcome>;
}

/**
 * pdf-to-png-converter backed rasterizer. Pages are rendered into a
 * temporary directory that is always removed before returning.
 */
export class PngPdfRasterizer implements PdfRasterizer {
  constructor(private readonly viewportScale: number) {}

  async rasterize(
    pdf: Buffer,
    options: { maxPages: number },
  ): Promise<RasterizeOutcome> {
    try {
      const pages = await withTempDir("kinship-pdf", async (dir) => {
        const source = path.join(dir, "document.pdf");
        await fs.writeFile(source, pdf);
        const rendered = await pdfToPng(source, {
          viewportScale: this.viewportScale,
          outputFolder: dir,
          pagesToProcess: Array.from(
            { length: options.maxPages },
            (_, index) => index + 1,
          ),
        });
        return Promise.all(
          rendered.map((page) => page.content ?? fs.readFile(page.path)),
        );
      });
      if (pages.length === 0) {
        return { status: "failed", reason: "PDF has no pages" };
      }
      return { status: "ok", pages };
    } catch (error) {
      return {
        status: "failed",
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
