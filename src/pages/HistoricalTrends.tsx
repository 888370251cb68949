import { useEffect, useMemo, useState } from "react";
import { Link } from "react-router-dom";
import AppShell from "../components/AppShell";
import TrendChart from "../components/TrendChart";
import { useDash } from "../contexts/DashContext";
import { useLoader } from "../hooks/useLoader";
import { downloadCsv, seriesToCsv, trendsFileName } from "../lib/csv";
import { TREND_PRESETS, defaultTrendWindow, round1, trendWindow, type DamStatistic } from "../lib/trends";
import { formatDateRangeLabel } from "../lib/week";

// ─── Helpers ──────────────────────────────────────────────────────────────────

function fmt(v: number | undefined): string {
  const r = round1(v);
  return r === undefined ? "—" : String(r);
}

const STAT_COLUMNS: { label: string; cell: (s: DamStatistic) => string }[] = [
  { label: "Dam", cell: s => s.dam },
  { label: "Province", cell: s => s.province ?? "—" },
  { label: "River", cell: s => s.river ?? "—" },
  { label: "Min %", cell: s => fmt(s.min) },
  { label: "Max %", cell: s => fmt(s.max) },
  { label: "Average %", cell: s => fmt(s.mean) },
  { label: "Current %", cell: s => fmt(s.current) },
  { label: "Std Dev", cell: s => fmt(s.stdDev) },
  { label: "Data Points", cell: s => String(s.sampleCount) },
];

// ─── Dam picker ───────────────────────────────────────────────────────────────

function DamPicker({
  dams,
  selected,
  onChange,
}: {
  dams: readonly string[];
  selected: readonly string[];
  onChange: (next: string[]) => void;
}) {
  const [search, setSearch] = useState("");
  const visible = useMemo(
    () => dams.filter(d => d.toLowerCase().includes(search.toLowerCase())),
    [dams, search],
  );

  const toggle = (dam: string) =>
    onChange(selected.includes(dam) ? selected.filter(d => d !== dam) : [...selected, dam]);

  return (
    <div>
      <div className="flex flex-wrap gap-1.5">
        {selected.map(d => (
          <button
            key={d}
            type="button"
            onClick={() => toggle(d)}
            className="rounded-full border border-blue-200 bg-blue-50 px-2.5 py-0.5 text-xs font-semibold text-blue-700 hover:bg-blue-100"
          >
            {d} ✕
          </button>
        ))}
      </div>
      <input
        value={search}
        onChange={e => setSearch(e.target.value)}
        placeholder="Search dams…"
        className="mt-2 w-full rounded-xl border border-gray-200 bg-white px-3 py-2 text-sm"
      />
      <div className="mt-2 max-h-48 overflow-y-auto rounded-xl border border-gray-100 bg-white">
        {visible.map(d => (
          <label key={d} className="flex cursor-pointer items-center gap-2 px-3 py-1.5 text-sm text-gray-700 hover:bg-gray-50">
            <input type="checkbox" checked={selected.includes(d)} onChange={() => toggle(d)} />
            {d}
          </label>
        ))}
        {!visible.length && <p className="px-3 py-2 text-xs text-gray-400">No dams match “{search}”.</p>}
      </div>
    </div>
  );
}

// ─── Main component ───────────────────────────────────────────────────────────

export default function HistoricalTrends() {
  const dash = useDash();
  const [start, setStart] = useState("");
  const [end, setEnd] = useState("");
  const [selected, setSelected] = useState<string[]>([]);

  const range = useLoader(() => dash.dateRange(), [dash], "date range");
  const dams = useLoader(() => dash.dams(), [dash], "dam list");

  // Default to the last six months of data once the range is known.
  useEffect(() => {
    if (range.data && !start && !end) {
      const w = defaultTrendWindow(range.data);
      setStart(w.start);
      setEnd(w.end);
    }
  }, [range.data, start, end]);

  const ready = selected.length > 0 && !!start && !!end;
  const trends = useLoader(
    ready ? () => dash.trends(selected, start, end) : null,
    [dash, ready, selected, start, end],
    "historical data",
  );

  const span = range.data;
  const error = range.error ?? dams.error ?? trends.error;
  const series = trends.data?.series ?? [];
  const stats = trends.data?.stats ?? [];

  return (
    <AppShell>
      <div className="space-y-6">

        {/* Header */}
        <div className="flex flex-wrap items-start justify-between gap-3">
          <div>
            <h1 className="text-xl font-bold text-gray-900 sm:text-2xl">📈 Historical Dam Trends</h1>
            <p className="mt-1 text-sm text-gray-500">Analyze water level trends over time for multiple dams.</p>
          </div>
          <Link
            to="/"
            className="rounded-lg border border-gray-200 px-3 py-1.5 text-sm font-medium text-gray-500 hover:bg-gray-50 hover:text-gray-700"
          >
            ← Back to Dashboard
          </Link>
        </div>

        {error && (
          <p className="rounded-xl border border-red-100 bg-red-50 px-3 py-2 text-xs text-red-700">❌ {error}</p>
        )}

        {/* ── Controls ─────────────────────────────────────────────────── */}
        <div className="grid grid-cols-1 gap-4 lg:grid-cols-2">
          <div className="rounded-2xl border border-gray-100 bg-white p-5 shadow-sm">
            <h2 className="text-sm font-bold text-gray-900">📅 Date Range</h2>
            <div className="mt-3 grid grid-cols-2 gap-3">
              <label>
                <span className="text-xs font-semibold text-gray-500">Start Date</span>
                <input
                  type="date"
                  value={start}
                  min={range.data?.earliest}
                  max={range.data?.latest}
                  onChange={e => setStart(e.target.value)}
                  className="mt-1 w-full rounded-xl border border-gray-200 px-3 py-2 text-sm"
                />
              </label>
              <label>
                <span className="text-xs font-semibold text-gray-500">End Date</span>
                <input
                  type="date"
                  value={end}
                  min={range.data?.earliest}
                  max={range.data?.latest}
                  onChange={e => setEnd(e.target.value)}
                  className="mt-1 w-full rounded-xl border border-gray-200 px-3 py-2 text-sm"
                />
              </label>
            </div>
            {span && (
              <div className="mt-3 flex flex-wrap gap-1.5">
                {TREND_PRESETS.map(p => {
                  const w = trendWindow(span, p.days);
                  const active = w.start === start && w.end === end;
                  return (
                    <button
                      key={p.label}
                      type="button"
                      onClick={() => {
                        setStart(w.start);
                        setEnd(w.end);
                      }}
                      className={
                        active
                          ? "rounded-lg bg-gray-900 px-2.5 py-1 text-xs font-semibold text-white"
                          : "rounded-lg border border-gray-200 px-2.5 py-1 text-xs font-medium text-gray-500 hover:bg-gray-50"
                      }
                    >
                      {p.label}
                    </button>
                  );
                })}
              </div>
            )}
            {start && end && start <= end && (
              <p className="mt-2 text-xs text-gray-400">{formatDateRangeLabel(start, end)}</p>
            )}
          </div>

          <div className="rounded-2xl border border-gray-100 bg-white p-5 shadow-sm">
            <h2 className="text-sm font-bold text-gray-900">🏞️ Dam Selection</h2>
            <p className="mt-0.5 text-xs text-gray-400">Choose dams to compare</p>
            <div className="mt-3">
              <DamPicker dams={dams.data ?? []} selected={selected} onChange={setSelected} />
            </div>
          </div>
        </div>

        {!selected.length && (
          <p className="rounded-xl border border-blue-100 bg-blue-50 px-3 py-2 text-xs text-blue-700">
            👆 Please select at least one dam to view historical trends
          </p>
        )}

        {trends.loading && (
          <div className="flex items-center gap-2 py-6 text-sm text-gray-400">
            <div className="h-3 w-3 animate-spin rounded-full border-2 border-gray-200 border-t-gray-500" />
            Loading historical data…
          </div>
        )}

        {trends.data && !series.length && (
          <p className="rounded-xl border border-amber-100 bg-amber-50 px-3 py-2 text-xs text-amber-700">
            ⚠ No data found for the selected dams and date range
          </p>
        )}

        {series.length > 0 && (
          <>
            {/* ── Trend chart ────────────────────────────────────────────── */}
            <div className="rounded-2xl border border-gray-100 bg-white p-5 shadow-sm">
              <h2 className="text-sm font-bold text-gray-900">📊 Water Level Trends</h2>
              <p className="mt-0.5 text-xs text-gray-400">Historical water levels over time</p>
              <div className="mt-4">
                <TrendChart series={series} />
              </div>
            </div>

            {/* ── Statistics ─────────────────────────────────────────────── */}
            <div className="rounded-2xl border border-gray-100 bg-white p-5 shadow-sm">
              <div className="flex items-center justify-between gap-3">
                <h2 className="text-sm font-bold text-gray-900">📊 Summary Statistics</h2>
                <button
                  type="button"
                  onClick={() => downloadCsv(trendsFileName(start, end), seriesToCsv(series))}
                  className="rounded-xl bg-gray-900 px-3 py-1.5 text-xs font-semibold text-white hover:bg-gray-800"
                >
                  📥 Download data
                </button>
              </div>
              <div className="mt-3 overflow-x-auto">
                <table className="min-w-full text-sm">
                  <thead className="bg-gray-50 text-[11px] uppercase tracking-wider text-gray-500">
                    <tr>
                      {STAT_COLUMNS.map(c => (
                        <th key={c.label} className="px-3 py-2 text-left font-semibold">{c.label}</th>
                      ))}
                    </tr>
                  </thead>
                  <tbody className="divide-y divide-gray-100">
                    {stats.map(s => (
                      <tr key={s.dam}>
                        {STAT_COLUMNS.map(c => (
                          <td key={c.label} className="px-3 py-2 text-gray-700">{c.cell(s)}</td>
                        ))}
                      </tr>
                    ))}
                  </tbody>
                </table>
              </div>
            </div>
          </>
        )}
      </div>
    </AppShell>
  );
}
