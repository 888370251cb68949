import type { ReactNode } from "react";
import type { TableRow } from "../lib/projector";

export type DisplayColumn = {
  label: string;
  cell: (row: TableRow) => ReactNode;
  numeric?: boolean;
};

function num(v: number | undefined, digits = 1): string {
  return v === undefined ? "—" : v.toFixed(digits);
}

function text(v: string | number | undefined): string {
  return v === undefined ? "—" : String(v);
}

function ChangeCell({ row }: { row: TableRow }) {
  const d = row.changeNumeric ?? 0;
  const cls = d > 0 ? "text-emerald-600" : d < 0 ? "text-red-600" : "text-gray-400";
  return <span className={`font-semibold ${cls}`}>{row.change}</span>;
}

export const LEVEL_COLUMNS: readonly DisplayColumn[] = [
  { label: "Dam Name", cell: r => text(r.dam) },
  { label: "Province", cell: r => text(r.province) },
  { label: "River", cell: r => text(r.river) },
  { label: "Current %", cell: r => num(r.thisWeek), numeric: true },
  { label: "Weekly Change", cell: r => <ChangeCell row={r} />, numeric: true },
  { label: "FSC Million m³", cell: r => num(r.fscMillions, 2), numeric: true },
];

export const FACT_COLUMNS: readonly DisplayColumn[] = [
  { label: "Dam Name", cell: r => text(r.dam) },
  { label: "Last Year %", cell: r => num(r.lastYear), numeric: true },
  { label: "Wall Height (m)", cell: r => num(r.wallHeightM), numeric: true },
  { label: "Year Built", cell: r => text(r.yearCompleted), numeric: true },
  { label: "Nearest Town", cell: r => text(r.nearestLocale) },
];

export default function DamTable({
  rows,
  columns,
  emptyText = "No dams found for your selection.",
}: {
  rows: readonly TableRow[];
  columns: readonly DisplayColumn[];
  emptyText?: string;
}) {
  if (!rows.length) {
    return (
      <div className="rounded-2xl border border-gray-100 bg-white px-6 py-10 text-center">
        <p className="text-sm font-semibold text-gray-500">{emptyText}</p>
      </div>
    );
  }

  return (
    <div className="max-h-[520px] overflow-auto rounded-2xl border border-gray-100 bg-white shadow-sm">
      <table className="min-w-full text-sm">
        <thead className="sticky top-0 bg-gray-50 text-[11px] uppercase tracking-wider text-gray-500">
          <tr>
            {columns.map(c => (
              <th key={c.label} className={`px-3 py-2 font-semibold ${c.numeric ? "text-right" : "text-left"}`}>
                {c.label}
              </th>
            ))}
          </tr>
        </thead>
        <tbody className="divide-y divide-gray-100">
          {rows.map((row, i) => (
            <tr key={`${row.dam ?? "row"}-${row.reportDate ?? ""}-${i}`} className="hover:bg-gray-50">
              {columns.map(c => (
                <td key={c.label} className={`px-3 py-2 text-gray-700 ${c.numeric ? "text-right tabular-nums" : ""}`}>
                  {c.cell(row)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
