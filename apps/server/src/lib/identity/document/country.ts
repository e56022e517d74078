import countries from "i18n-iso-countries";
import english from "i18n-iso-countries/langs/en.json";

import countryNames from "./country-names.json";

countries.registerLocale(english);

const PASSPORT_COUNTRY_NAMES: Readonly<Record<string, string>> = countryNames;

/**
 * English country name for an MRZ country code. Short local names come
 * first, then the ISO 3166 registry; unknown codes pass through unchanged.
 */
export function countryNameForCode(code: string): string {
  const normalized = code.replace(/</g, "").trim().toUpperCase();
  if (!normalized) return code;

  const local = PASSPORT_COUNTRY_NAMES[normalized];
  if (local) return local;

  if (normalized.length === 3) {
    const isoName = countries.getName(normalized, "en", { select: "official" });
    if (isoName) return isoName;
  }
  return code;
}
