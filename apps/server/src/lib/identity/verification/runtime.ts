import type { OcrEngine } from "@/lib/identity/document/ocr";
import type { PdfRasterizer } from "@/lib/identity/document/pdf";
import type { FaceEngine } from "@/lib/identity/face/face-engine";
import type { AutoVerificationSettings } from "./settings";

import { getServerConfig } from "@/lib/env";
import { TesseractOcrEngine } from "@/lib/identity/document/ocr";
import { PngPdfRasterizer } from "@/lib/identity/document/pdf";
import { HumanFaceEngine } from "@/lib/identity/face/human-server";
import { FileStore } from "@/lib/storage/file-store";

import { getAutoVerificationSettings } from "./settings";

/**
 * Heavy collaborators of the verification pipeline. Engines load their
 * models on first use; nothing is initialized at import time.
 */
export interface VerificationRuntime {
  ocr: OcrEngine;
  face: FaceEngine;
  pdf: PdfRasterizer;
  files: FileStore;
  settings: () => AutoVerificationSettings;
  maxUploadBytes: number;
  now: () => Date;
}

export function createDefaultRuntime(): VerificationRuntime {
  const config = getServerConfig();
  return {
    ocr: new TesseractOcrEngine({
      languages: config.OCR_LANGUAGES,
      langPath: config.OCR_LANG_PATH,
    }),
    face: new HumanFaceEngine({ modelsDir: config.FACE_MODELS_PATH }),
    pdf: new PngPdfRasterizer(config.PDF_RENDER_SCALE),
    files: new FileStore(config.UPLOAD_DIR),
    settings: getAutoVerificationSettings,
    maxUploadBytes: config.MAX_UPLOAD_BYTES,
    now: () => new Date(),
  };
}
