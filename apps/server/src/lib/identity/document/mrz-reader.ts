import type { OcrEngine } from "./ocr";

import { logger } from "@/lib/logging/logger";

import { cropBottomBand } from "./image-processing";
import { type IdentityRecord, parseMrzFromText } from "./mrz";

const MRZ_BAND_FRACTION = 0.35;

export type MrzReadOutcome =
  | { status: "ok"; record: IdentityRecord }
  | { status: "not_found" }
  | { status: "unavailable"; reason: string };

/**
 * Read a passport MRZ: the lower band of the page first, then the whole
 * page. A checksum-valid record wins; otherwise the first decoded one.
 */
export async function readPassportMrz(
  ocr: OcrEngine,
  image: Buffer,
): Promise<MrzReadOutcome> {
  const candidates: Buffer[] = [];
  try {
    candidates.push(await cropBottomBand(image, MRZ_BAND_FRACTION));
  } catch (error) {
    logger.debug({ error: String(error) }, "MRZ band crop failed");
  }
  candidates.push(image);

  let bestEffort: IdentityRecord | null = null;
  for (const candidate of candidates) {
    const outcome = await ocr.recognize(candidate, { mode: "mrz" });
    if (outcome.status === "unavailable") {
      return outcome;
    }
    const record = parseMrzFromText(outcome.text);
    if (record?.valid) {
      return { status: "ok", record };
    }
    bestEffort ??= record;
  }

  return bestEffort ? { status: "ok", record: bestEffort } : { status: "not_found" };
}
