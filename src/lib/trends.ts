import { InvalidRange, NoSelection } from "./errors";
import type { ReportDateRange } from "./filters";
import type { ReportField, ReportStore } from "./reportStore";
import { isIsoDate, shiftIsoDate } from "./week";

export interface TrendPoint {
  dam: string;
  reportDate: string;
  percent: number;
  province?: string;
  river?: string;
}

export interface DamStatistic {
  dam: string;
  province?: string;
  river?: string;
  min: number;
  max: number;
  mean: number;
  /** Sample standard deviation; absent below two points. */
  stdDev?: number;
  current: number;
  sampleCount: number;
}

export interface TrendResult {
  series: TrendPoint[];
  stats: DamStatistic[];
}

export const TREND_FIELDS = [
  "dam",
  "report_date",
  "this_week",
  "province",
  "river",
] as const satisfies readonly ReportField[];

export const REFERENCE_LINES = [
  { value: 25, label: "Low (25%)", color: "#dc2626" },
  { value: 50, label: "Moderate (50%)", color: "#f97316" },
  { value: 75, label: "Good (75%)", color: "#16a34a" },
] as const;

export const DEFAULT_WINDOW_DAYS = 180;

export interface TrendPreset {
  label: string;
  /** Days back from the latest report; absent means the whole range. */
  days?: number;
}

export const TREND_PRESETS: readonly TrendPreset[] = [
  { label: "1m", days: 30 },
  { label: "3m", days: 91 },
  { label: "6m", days: DEFAULT_WINDOW_DAYS },
  { label: "1y", days: 365 },
  { label: "All" },
];

function assertRange(start: string, end: string) {
  if (!isIsoDate(start) || !isIsoDate(end)) {
    throw new InvalidRange(`Dates must be YYYY-MM-DD (got "${start}" and "${end}")`);
  }
  if (start > end) throw new InvalidRange("Start date must be before end date");
}

export async function aggregateTrends(
  store: ReportStore,
  damNames: Iterable<string>,
  start: string,
  end: string,
): Promise<TrendResult> {
  const dams = Array.from(new Set(damNames));
  if (!dams.length) throw new NoSelection("Select at least one dam to view historical trends");
  assertRange(start, end);

  const reports = await store.find(
    { dams, reportDateFrom: start, reportDateTo: end },
    TREND_FIELDS,
  );

  const series: TrendPoint[] = [];
  for (const r of reports) {
    if (r.dam === undefined || r.report_date === undefined || r.this_week === undefined) continue;
    series.push({
      dam: r.dam,
      reportDate: r.report_date,
      percent: r.this_week,
      province: r.province,
      river: r.river,
    });
  }
  series.sort((a, b) =>
    a.dam !== b.dam ? (a.dam < b.dam ? -1 : 1) : a.reportDate < b.reportDate ? -1 : a.reportDate > b.reportDate ? 1 : 0,
  );

  return { series, stats: summarizeSeries(series, dams) };
}

/** Per-dam statistics in `damOrder`; dams without points are left out. */
export function summarizeSeries(series: readonly TrendPoint[], damOrder: readonly string[]): DamStatistic[] {
  const byDam = new Map<string, TrendPoint[]>();
  for (const p of series) {
    const list = byDam.get(p.dam);
    if (list) list.push(p);
    else byDam.set(p.dam, [p]);
  }

  const stats: DamStatistic[] = [];
  for (const dam of damOrder) {
    const points = byDam.get(dam);
    if (!points?.length) continue;

    const values = points.map(p => p.percent);
    const n = values.length;
    const mean = values.reduce((s, v) => s + v, 0) / n;
    const stdDev =
      n >= 2 ? Math.sqrt(values.reduce((s, v) => s + (v - mean) ** 2, 0) / (n - 1)) : undefined;

    stats.push({
      dam,
      province: points[0].province,
      river: points[0].river,
      min: Math.min(...values),
      max: Math.max(...values),
      mean,
      stdDev,
      current: values[n - 1],
      sampleCount: n,
    });
  }
  return stats;
}

/** The last `days` of data ending on the latest report, never before the first one. */
export function trendWindow(range: ReportDateRange, days?: number): { start: string; end: string } {
  if (days === undefined) return { start: range.earliest, end: range.latest };
  const start = shiftIsoDate(range.latest, -days);
  return { start: start < range.earliest ? range.earliest : start, end: range.latest };
}

export function defaultTrendWindow(range: ReportDateRange): { start: string; end: string } {
  return trendWindow(range, DEFAULT_WINDOW_DAYS);
}

/** "Province · River" per dam, from its first point that carries either. */
export function damDetails(series: readonly TrendPoint[]): Map<string, string> {
  const out = new Map<string, string>();
  for (const p of series) {
    if (out.has(p.dam)) continue;
    const detail = [p.province, p.river].filter(v => v !== undefined && v !== "").join(" · ");
    if (detail) out.set(p.dam, detail);
  }
  return out;
}

export function round1(v: number | undefined): number | undefined {
  return v === undefined ? undefined : Math.round(v * 10) / 10;
}
