// src/lib/week.ts
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

export function isIsoDate(value: string): boolean {
  const m = ISO_DATE.exec(value);
  if (!m) return false;
  const d = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  return d.getUTCMonth() === Number(m[2]) - 1 && d.getUTCDate() === Number(m[3]);
}

/** Trims a timestamp such as "2025-02-10T00:00:00+00:00" down to "2025-02-10". */
export function toIsoDate(value: string): string {
  const m = ISO_DATE.exec(value);
  return m ? `${m[1]}-${m[2]}-${m[3]}` : value;
}

function utcDate(iso: string): Date {
  return new Date(`${toIsoDate(iso)}T12:00:00Z`);
}

function isoFromUtc(d: Date): string {
  const yyyy = d.getUTCFullYear();
  const mm = String(d.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(d.getUTCDate()).padStart(2, "0");
  return `${yyyy}-${mm}-${dd}`;
}

export function shiftIsoDate(iso: string, days: number): string {
  const d = utcDate(iso);
  d.setUTCDate(d.getUTCDate() + days);
  return isoFromUtc(d);
}

// "10 Feb 2025"
export function formatReportDate(iso: string): string {
  const d = utcDate(iso);
  const day = String(d.getUTCDate()).padStart(2, "0");
  return `${day} ${MONTHS[d.getUTCMonth()]} ${d.getUTCFullYear()}`;
}

export function formatDateRangeLabel(start: string, end: string): string {
  if (toIsoDate(start) === toIsoDate(end)) return formatReportDate(start);

  const s = utcDate(start);
  const e = utcDate(end);
  const day = (d: Date) => String(d.getUTCDate()).padStart(2, "0");

  if (s.getUTCFullYear() === e.getUTCFullYear()) {
    if (s.getUTCMonth() === e.getUTCMonth()) return `${day(s)}–${formatReportDate(end)}`;
    return `${day(s)} ${MONTHS[s.getUTCMonth()]}–${formatReportDate(end)}`;
  }
  return `${formatReportDate(start)}–${formatReportDate(end)}`;
}
