/**
 * TD3 (passport) machine-readable zone parsing.
 *
 * Works on OCR output: finds the two 44-character lines, validates the
 * ICAO 9303 check digits and decodes the identity fields. Data is returned
 * even when check digits fail, flagged `valid: false`.
 */

export const TD3_LINE_LENGTH = 44;

const FILLER = "<";
const CHECK_WEIGHTS = [7, 3, 1] as const;
const MRZ_YEAR_PIVOT = 30;

// Tolerated OCR line length before padding/truncation
const MIN_LINE_LENGTH = 30;
const MAX_LINE_LENGTH = 48;

export type MrzSex = "M" | "F" | "X";

export interface IdentityRecord {
  valid: boolean;
  firstName: string;
  lastName: string;
  /** ISO date (YYYY-MM-DD) or null when undecodable */
  birthDate: string | null;
  expiryDate: string | null;
  /** ICAO nationality code, filler removed */
  nationality: string;
  documentNumber: string;
  sex: MrzSex;
  issuingCountry: string;
  rawMrzText: string;
}

export interface MrzCheckResults {
  documentNumber: boolean;
  birthDate: boolean;
  expiryDate: boolean;
  personalNumber: boolean;
  composite: boolean;
}

function charValue(char: string): number {
  if (char >= "0" && char <= "9") return char.charCodeAt(0) - 48;
  if (char >= "A" && char <= "Z") return char.charCodeAt(0) - 55;
  return 0;
}

/**
 * ICAO 9303 check digit: weights 7-3-1, letters A=10..Z=35, filler 0.
 */
export function computeCheckDigit(value: string): number {
  let sum = 0;
  for (let i = 0; i < value.length; i++) {
    sum += charValue(value.charAt(i)) * (CHECK_WEIGHTS[i % 3] ?? 0);
  }
  return sum % 10;
}

function checkDigitMatches(value: string, digit: string): boolean {
  // A filler check digit is used for empty optional fields
  const expected = digit === FILLER ? 0 : Number(digit);
  if (Number.isNaN(expected)) return false;
  return computeCheckDigit(value) === expected;
}

/**
 * Decode an MRZ YYMMDD date. Two-digit years up to 30 are 20xx,
 * later ones 19xx. Returns an ISO date or null.
 */
export function parseMrzDate(value: string): string | null {
  const digits = value.replace(/\D/g, "");
  if (digits.length !== 6) return null;

  const yy = Number(digits.slice(0, 2));
  const month = Number(digits.slice(2, 4));
  const day = Number(digits.slice(4, 6));
  const year = yy <= MRZ_YEAR_PIVOT ? 2000 + yy : 1900 + yy;

  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return `${year}-${digits.slice(2, 4)}-${digits.slice(4, 6)}`;
}

/**
 * Filler to spaces, collapsed whitespace, title case.
 */
export function cleanMrzName(value: string): string {
  return value
    .replace(/</g, " ")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_, prefix: string, letter: string) => {
      return prefix + letter.toUpperCase();
    });
}

function normalizeLine(line: string): string {
  return line
    .toUpperCase()
    .replace(/[«‹]/g, FILLER)
    .replace(/\s+/g, "")
    .replace(/[^A-Z0-9<]/g, "");
}

/**
 * Pad with filler or truncate to exactly 44 characters.
 */
export function normalizeTd3Line(line: string): string {
  const normalized = normalizeLine(line);
  return normalized.length >= TD3_LINE_LENGTH
    ? normalized.slice(0, TD3_LINE_LENGTH)
    : normalized.padEnd(TD3_LINE_LENGTH, FILLER);
}

/**
 * Find the TD3 line pair in OCR text: a line starting with `P` plus a
 * document subtype or filler, followed by the data line.
 */
export function locateTd3Lines(text: string): [string, string] | null {
  const lines = text
    .split(/\r?\n/)
    .map(normalizeLine)
    .filter(
      (line) =>
        line.length >= MIN_LINE_LENGTH &&
        line.length <= MAX_LINE_LENGTH &&
        line.includes(FILLER),
    );

  for (let i = 0; i < lines.length - 1; i++) {
    const first = lines[i];
    const second = lines[i + 1];
    if (first && second && /^P[A-Z<]/.test(first)) {
      return [normalizeTd3Line(first), normalizeTd3Line(second)];
    }
  }
  return null;
}

export function verifyTd3CheckDigits(line2: string): MrzCheckResults {
  const composite =
    line2.slice(0, 10) + line2.slice(13, 20) + line2.slice(21, 43);
  return {
    documentNumber: checkDigitMatches(line2.slice(0, 9), line2.charAt(9)),
    birthDate: checkDigitMatches(line2.slice(13, 19), line2.charAt(19)),
    expiryDate: checkDigitMatches(line2.slice(21, 27), line2.charAt(27)),
    personalNumber: checkDigitMatches(line2.slice(28, 42), line2.charAt(42)),
    composite: checkDigitMatches(composite, line2.charAt(43)),
  };
}

function stripFiller(value: string): string {
  return value.replace(/</g, "").trim();
}

function decodeSex(value: string): MrzSex {
  if (value === "M" || value === "F") return value;
  return "X";
}

/**
 * Decode a normalized TD3 line pair. Returns null when no name could be
 * decoded at all; otherwise the record, `valid` only if every check passes.
 */
export function parseTd3(line1: string, line2: string): IdentityRecord | null {
  if (line1.length !== TD3_LINE_LENGTH || line2.length !== TD3_LINE_LENGTH) {
    return null;
  }

  const nameField = line1.slice(5);
  const separator = nameField.indexOf("<<");
  const lastName = cleanMrzName(
    separator >= 0 ? nameField.slice(0, separator) : nameField,
  );
  const firstName =
    separator >= 0 ? cleanMrzName(nameField.slice(separator + 2)) : "";
  if (!lastName && !firstName) {
    return null;
  }

  const checks = verifyTd3CheckDigits(line2);
  const birthDate = parseMrzDate(line2.slice(13, 19));
  const expiryDate = parseMrzDate(line2.slice(21, 27));
  const valid =
    Object.values(checks).every(Boolean) &&
    birthDate !== null &&
    expiryDate !== null;

  return {
    valid,
    firstName,
    lastName,
    birthDate,
    expiryDate,
    nationality: stripFiller(line2.slice(10, 13)),
    documentNumber: stripFiller(line2.slice(0, 9)),
    sex: decodeSex(line2.charAt(20)),
    issuingCountry: stripFiller(line1.slice(2, 5)),
    rawMrzText: `${line1}\n${line2}`,
  };
}

/**
 * Locate and decode a TD3 MRZ inside free OCR text.
 */
export function parseMrzFromText(text: string): IdentityRecord | null {
  const lines = locateTd3Lines(text);
  if (!lines) return null;
  return parseTd3(lines[0], lines[1]);
}
