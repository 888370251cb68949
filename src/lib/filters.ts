import type { ReportStore } from "./reportStore";

export const ALL_DATES = "all-dates";
export const ALL_PROVINCES = "all-provinces";

/** A report date (YYYY-MM-DD) or ALL_DATES. */
export type DateSelection = string;
/** A province name or ALL_PROVINCES. */
export type ProvinceSelection = string;

export interface ReportDateRange {
  earliest: string;
  latest: string;
}

export async function listReportDates(store: ReportStore): Promise<string[]> {
  const dates = await store.distinct("report_date");
  return dates.sort((a, b) => (a < b ? 1 : a > b ? -1 : 0));
}

export async function listProvinces(store: ReportStore): Promise<string[]> {
  const provinces = await store.distinct("province");
  return provinces.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export async function listDams(store: ReportStore): Promise<string[]> {
  const dams = await store.distinct("dam");
  return dams.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export async function latestReportDate(store: ReportStore): Promise<string | undefined> {
  const latest = await store.findOne("desc", ["report_date"]);
  return latest?.report_date;
}

export async function reportDateRange(store: ReportStore): Promise<ReportDateRange | undefined> {
  const [first, last] = await Promise.all([
    store.findOne("asc", ["report_date"]),
    store.findOne("desc", ["report_date"]),
  ]);
  if (!first?.report_date || !last?.report_date) return undefined;
  return { earliest: first.report_date, latest: last.report_date };
}

// The dashboard opens on the newest week when it is one of the options.
export function defaultDateSelection(dates: readonly string[], latest: string | undefined): DateSelection {
  return latest !== undefined && dates.includes(latest) ? latest : ALL_DATES;
}
