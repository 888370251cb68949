import { ALL_DATES, ALL_PROVINCES, type DateSelection, type ProvinceSelection } from "./filters";
import type { Report, ReportField, ReportQuery, ReportStore } from "./reportStore";

export interface TableRow {
  dam?: string;
  province?: string;
  river?: string;
  nearestLocale?: string;
  reportDate?: string;
  /** Full storage capacity in million m³. */
  fscMillions?: number;
  thisWeek?: number;
  lastYear?: number;
  wallHeightM?: number;
  yearCompleted?: number;
  latLong?: (number | null)[];
  change: string;
  /** this_week - last_week, when both are known. */
  changeNumeric?: number;
}

export const PROJECTED_FIELDS = [
  "dam",
  "province",
  "river",
  "nearest_locale",
  "report_date",
  "full_storage_capacity",
  "this_week",
  "last_week",
  "last_year",
  "wall_height_m",
  "year_completed",
  "lat_long",
] as const satisfies readonly ReportField[];

export const NO_CHANGE = "◼ 0%";

export function formatChange(delta: number | undefined): string {
  if (delta === undefined || Number.isNaN(delta) || delta === 0) return NO_CHANGE;
  const magnitude = `${Math.abs(delta).toFixed(1)}%`;
  return delta > 0 ? `🔼 ${magnitude}` : `🔻 ${magnitude}`;
}

export function toTableRow(report: Report): TableRow {
  const { this_week, last_week, full_storage_capacity } = report;
  const changeNumeric =
    this_week !== undefined && last_week !== undefined ? this_week - last_week : undefined;

  return {
    dam: report.dam,
    province: report.province,
    river: report.river,
    nearestLocale: report.nearest_locale,
    reportDate: report.report_date,
    fscMillions: full_storage_capacity !== undefined ? full_storage_capacity / 1e6 : undefined,
    thisWeek: this_week,
    lastYear: report.last_year,
    wallHeightM: report.wall_height_m,
    yearCompleted: report.year_completed,
    latLong: report.lat_long,
    change: formatChange(changeNumeric),
    changeNumeric,
  };
}

export function buildReportQuery(date: DateSelection, province: ProvinceSelection): ReportQuery {
  const query: ReportQuery = {};
  if (date !== ALL_DATES) query.reportDate = date;
  if (province !== ALL_PROVINCES) query.province = province;
  return query;
}

/** Rows in the order the store returned them. */
export async function projectRows(
  store: ReportStore,
  date: DateSelection,
  province: ProvinceSelection,
): Promise<TableRow[]> {
  const reports = await store.find(buildReportQuery(date, province), PROJECTED_FIELDS);
  return reports.map(toTableRow);
}

function compareText(a: string | undefined, b: string | undefined): number {
  if (a === b) return 0;
  if (a === undefined) return 1;
  if (b === undefined) return -1;
  return a < b ? -1 : 1;
}

// Province A→Z, then fullest dam first; missing values go last.
export function sortForDisplay(rows: readonly TableRow[]): TableRow[] {
  return [...rows].sort((a, b) => {
    const byProvince = compareText(a.province, b.province);
    if (byProvince !== 0) return byProvince;
    if (a.thisWeek === b.thisWeek) return 0;
    if (a.thisWeek === undefined) return 1;
    if (b.thisWeek === undefined) return -1;
    return b.thisWeek - a.thisWeek;
  });
}
