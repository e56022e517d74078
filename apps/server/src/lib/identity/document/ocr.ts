import { createWorker, type Worker } from "tesseract.js";

import { logger } from "@/lib/logging/logger";

export type OcrMode = "text" | "mrz";

export type OcrOutcome =
  | { status: "ok"; text: string }
  | { status: "unavailable"; reason: string };

/**
 * Text recognition over encoded image bytes (PNG/JPEG).
 * Implementations report a missing runtime instead of throwing.
 */
export interface OcrEngine {
  available(): Promise<boolean>;
  recognize(image: Buffer, options?: { mode?: OcrMode }): Promise<OcrOutcome>;
  /** Release workers; the engine may be reused afterwards */
  terminate?(): Promise<void>;
}

const MRZ_CHARSET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789<";

export interface TesseractOcrOptions {
  /** Tesseract language string, e.g. "eng+rus" */
  languages: string;
  /** Directory or URL holding traineddata files */
  langPath?: string;
}

/**
 * tesseract.js backed engine. One worker per mode, created on first use
 * and kept for the process lifetime.
 */
export class TesseractOcrEngine implements OcrEngine {
  private readonly workers = new Map<OcrMode, Promise<Worker>>();

  constructor(private readonly options: TesseractOcrOptions) {}

  private getWorker(mode: OcrMode): Promise<Worker> {
    const existing = this.workers.get(mode);
    if (existing) return existing;

    const init = (async () => {
      const languages = mode === "mrz" ? "eng" : this.options.languages;
      const worker = await createWorker(languages, undefined, {
        ...(this.options.langPath ? { langPath: this.options.langPath } : {}),
      });
      if (mode === "mrz") {
        await worker.setParameters({ tessedit_char_whitelist: MRZ_CHARSET });
      }
      return worker;
    })();

    // Drop failed initializations so a later call can retry
    init.catch(() => {
      this.workers.delete(mode);
    });
    this.workers.set(mode, init);
    return init;
  }

  async available(): Promise<boolean> {
    try {
      await this.getWorker("text");
      return true;
    } catch (error) {
      logger.warn({ error: String(error) }, "OCR runtime not available");
      return false;
    }
  }

  async recognize(
    image: Buffer,
    options: { mode?: OcrMode } = {},
  ): Promise<OcrOutcome> {
    const mode = options.mode ?? "text";
    let worker: Worker;
    try {
      worker = await this.getWorker(mode);
    } catch (error) {
      return { status: "unavailable", reason: String(error) };
    }
    const { data } = await worker.recognize(image);
    return { status: "ok", text: data.text };
  }

  async terminate(): Promise<void> {
    const pending = [...this.workers.values()];
    this.workers.clear();
    for (const init of pending) {
      const worker = await init.catch(() => null);
      await worker?.terminate();
    }
  }
}
