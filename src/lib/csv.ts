import type { TableRow } from "./projector";
import type { TrendPoint } from "./trends";
import { formatReportDate } from "./week";
import { ALL_DATES, type DateSelection } from "./filters";

type Cell = string | number | undefined;

export interface Column<T> {
  label: string;
  value: (row: T) => Cell;
}

export const TABLE_COLUMNS: readonly Column<TableRow>[] = [
  { label: "Dam Name", value: r => r.dam },
  { label: "Province", value: r => r.province },
  { label: "River", value: r => r.river },
  { label: "Report Date", value: r => r.reportDate },
  { label: "Current %", value: r => r.thisWeek },
  { label: "Weekly Change", value: r => r.change },
  { label: "FSC Million m³", value: r => r.fscMillions },
  { label: "Last Year %", value: r => r.lastYear },
  { label: "Wall Height (m)", value: r => r.wallHeightM },
  { label: "Year Built", value: r => r.yearCompleted },
  { label: "Nearest Town", value: r => r.nearestLocale },
];

export const TREND_COLUMNS: readonly Column<TrendPoint>[] = [
  { label: "Dam Name", value: p => p.dam },
  { label: "Report Date", value: p => p.reportDate },
  { label: "Water Level (%)", value: p => p.percent },
  { label: "Province", value: p => p.province },
  { label: "River", value: p => p.river },
];

export function csvCell(v: Cell): string {
  if (v === undefined) return "";
  const s = String(v);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function toCsv<T>(columns: readonly Column<T>[], rows: readonly T[]): string {
  const lines = [columns.map(c => csvCell(c.label)).join(",")];
  for (const row of rows) lines.push(columns.map(c => csvCell(c.value(row))).join(","));
  return lines.join("\n");
}

export function rowsToCsv(rows: readonly TableRow[]): string {
  return toCsv(TABLE_COLUMNS, rows);
}

export function seriesToCsv(series: readonly TrendPoint[]): string {
  return toCsv(TREND_COLUMNS, series);
}

export function displayDate(date: DateSelection): string {
  return date === ALL_DATES ? "All Dates" : formatReportDate(date);
}

export function tableFileName(date: DateSelection): string {
  return `dam_data_${displayDate(date).replace(/ /g, "_")}.csv`;
}

export function trendsFileName(start: string, end: string): string {
  return `dam_trends_${start}_${end}.csv`;
}

export function downloadCsv(fileName: string, csv: string) {
  const blob = new Blob([csv], { type: "text/csv;charset=utf-8" });
  const url = URL.createObjectURL(blob);
  const a = document.createElement("a");
  a.href = url;
  a.download = fileName;
  a.click();
  URL.revokeObjectURL(url);
}
