const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Whole years between an ISO birth date and `today` (UTC calendar).
 * Returns null for a missing or unparseable date.
 */
export function calculateAge(
  birthDate: string | null | undefined,
  today: Date,
): number | null {
  if (!birthDate) return null;
  const match = ISO_DATE_PATTERN.exec(birthDate);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  let age = today.getUTCFullYear() - year;
  const currentMonth = today.getUTCMonth() + 1;
  if (
    currentMonth < month ||
    (currentMonth === month && today.getUTCDate() < day)
  ) {
    age -= 1;
  }
  return age;
}
