/**
 * Keys and patterns kept out of logs. Pino censors the keys itself;
 * `sanitizeForLog` covers values built at run time.
 */

const SENSITIVE_KEYS = {
  biometrics: ["image", "bytes", "embedding", "faceEmbedding"],
  documents: ["rawText", "raw_text", "rawMrzText", "extractedData", "mrz_data"],
  identity: [
    "firstName",
    "first_name",
    "lastName",
    "last_name",
    "birthDate",
    "birth_date",
    "nationality",
    "documentNumber",
    "document_number",
    "email",
  ],
  credentials: ["password", "secret", "token"],
} as const;

export const REDACT_KEYS: ReadonlySet<string> = new Set(
  Object.values(SENSITIVE_KEYS).flat(),
);

const MESSAGE_RULES: ReadonlyArray<[RegExp, string]> = [
  [/[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi, "[redacted-email]"],
  [/\b0x[a-fA-F0-9]{16,}\b/g, "[redacted-hex]"],
  // MRZ lines before digit runs so document numbers inside them go too
  [/[A-Z0-9<]{30,}/g, "[redacted-mrz]"],
  [/\b\d{6,}\b/g, "[redacted-number]"],
];

const MAX_MESSAGE_LENGTH = 500;
const TRUNCATED_PREFIX_LENGTH = 200;
const MAX_DEPTH = 4;
const MAX_ARRAY_LENGTH = 20;

export function sanitizeLogMessage(message: string): string {
  const redacted = MESSAGE_RULES.reduce(
    (text, [pattern, replacement]) => text.replace(pattern, replacement),
    message,
  );
  return redacted.length > MAX_MESSAGE_LENGTH
    ? `${redacted.slice(0, TRUNCATED_PREFIX_LENGTH)}…[truncated:${redacted.length}]`
    : redacted;
}

/**
 * Copy of `value` safe to log: sensitive keys censored, binary data and
 * large collections summarized, strings passed through `sanitizeLogMessage`.
 */
export function sanitizeForLog(
  value: unknown,
  depth = 0,
  seen: WeakSet<object> = new WeakSet(),
): unknown {
  if (depth > MAX_DEPTH) return "[max-depth]";

  if (typeof value === "string") {
    return value.length > MAX_MESSAGE_LENGTH
      ? `[string:${value.length}]`
      : sanitizeLogMessage(value);
  }
  if (typeof value !== "object" || value === null) {
    return value;
  }
  if (value instanceof Error) {
    return { name: value.name, message: sanitizeLogMessage(value.message) };
  }
  if (ArrayBuffer.isView(value)) {
    return `[binary:${value.byteLength / bytesPerElement(value)}]`;
  }
  if (seen.has(value)) return "[circular]";
  seen.add(value);

  if (Array.isArray(value)) {
    return value.length > MAX_ARRAY_LENGTH
      ? `[array:${value.length}]`
      : value.map((item) => sanitizeForLog(item, depth + 1, seen));
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [
      key,
      REDACT_KEYS.has(key) ? "[REDACTED]" : sanitizeForLog(entry, depth + 1, seen),
    ]),
  );
}

function bytesPerElement(view: ArrayBufferView): number {
  return "BYTES_PER_ELEMENT" in view && typeof view.BYTES_PER_ELEMENT === "number"
    ? view.BYTES_PER_ELEMENT
    : 1;
}
