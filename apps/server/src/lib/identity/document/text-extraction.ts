import type { DocumentType } from "@/lib/db/schema";

import documentKeywords from "./document-keywords.json";

export type DetectedDocumentType = DocumentType | "unknown";

// Checked in declaration order; the first keyword hit wins
const KEYWORD_SETS: ReadonlyArray<[DocumentType, readonly string[]]> = [
  ["passport", documentKeywords.passport],
  ["residence_permit", documentKeywords.residence_permit],
  ["divorce_certificate", documentKeywords.divorce_certificate],
  ["diploma", documentKeywords.diploma],
  ["employment_proof", documentKeywords.employment_proof],
];

const DATE_PATTERNS = [
  /\d{2}[./]\d{2}[./]\d{4}/g,
  /\d{4}[./]\d{2}[./]\d{2}/g,
  /(?<!\d)\d{1,2}\s+\p{L}+\s+\d{4}/gu,
];

const NAME_LETTERS = "A-Za-zА-Яа-яЁёЎўҚқҒғҲҳ";

function labelPattern(labels: string): RegExp {
  return new RegExp(
    `(?<!\\p{L})(?:${labels})[:\\s]+([${NAME_LETTERS}]+)`,
    "iu",
  );
}

const NAME_PATTERNS: ReadonlyArray<["first_name" | "last_name", RegExp]> = [
  ["last_name", labelPattern("surname|фамилияси|фамилия")],
  ["first_name", labelPattern("given names?|name|исм|имя")],
];

const MAX_DATES = 5;

export function detectDocumentType(text: string): DetectedDocumentType {
  const haystack = text.toLowerCase();
  for (const [documentType, keywords] of KEYWORD_SETS) {
    if (keywords.some((keyword) => haystack.includes(keyword))) {
      return documentType;
    }
  }
  return "unknown";
}

/**
 * Candidate date strings in order of appearance, first five kept.
 */
export function extractDates(text: string): string[] {
  const found: { index: number; value: string }[] = [];
  for (const pattern of DATE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const index = match.index ?? 0;
      const overlaps = found.some(
        (entry) =>
          index < entry.index + entry.value.length &&
          entry.index < index + match[0].length,
      );
      if (!overlaps) {
        found.push({ index, value: match[0] });
      }
    }
  }
  return found
    .sort((a, b) => a.index - b.index)
    .slice(0, MAX_DATES)
    .map((entry) => entry.value);
}

export function extractNames(
  text: string,
): Partial<Record<"first_name" | "last_name", string>> {
  const names: Partial<Record<"first_name" | "last_name", string>> = {};
  for (const [field, pattern] of NAME_PATTERNS) {
    const value = pattern.exec(text)?.[1];
    if (value && !names[field]) {
      names[field] = value;
    }
  }
  return names;
}
