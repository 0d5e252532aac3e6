export const MS_PER_DAY = 24 * 60 * 60 * 1000;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

/**
 * Parses a strict `YYYY-MM-DD` string into a Date at UTC midnight.
 * Returns undefined for anything else, including impossible days like 2025-02-30.
 */
export function parseIsoDate(value: string): Date | undefined {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return undefined;
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    return undefined;
  }
  return date;
}

/** `YYYY-MM-DD` of a Date read in UTC. */
export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** `YYYY-MM-DD` of the local calendar day `date` falls on. */
export function toLocalIsoDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

/** Whole days from `from` to `to`, both taken as UTC midnights. */
export function daysBetween(from: Date, to: Date): number {
  return Math.round((to.getTime() - from.getTime()) / MS_PER_DAY);
}

export function monthName(date: Date): string {
  return MONTHS[date.getUTCMonth()];
}

export type Season = "winter" | "spring" | "summer" | "autumn";

/** Season of a date, northern hemisphere. */
export function getSeason(date: Date): Season {
  const month = date.getUTCMonth() + 1;
  if (month === 12 || month <= 2) {
    return "winter";
  } else if (month <= 5) {
    return "spring";
  } else if (month <= 8) {
    return "summer";
  }
  return "autumn";
}
