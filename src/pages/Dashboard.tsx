import { useEffect, useMemo, useState } from "react";
import { Link } from "react-router-dom";
import AppShell from "../components/AppShell";
import DamMap from "../components/DamMap";
import DamTable, { FACT_COLUMNS, LEVEL_COLUMNS } from "../components/DamTable";
import { useDash } from "../contexts/DashContext";
import { useLoader } from "../hooks/useLoader";
import { displayDate, downloadCsv, rowsToCsv, tableFileName } from "../lib/csv";
import { ALL_DATES, ALL_PROVINCES, defaultDateSelection } from "../lib/filters";
import { getChangeHighlights, type HighlightTile } from "../lib/highlights";
import { toMarkers } from "../lib/markers";
import { sortForDisplay } from "../lib/projector";
import { formatReportDate } from "../lib/week";

type Tab = "table" | "map" | "analysis" | "about";

const TABS: { key: Tab; label: string }[] = [
  { key: "table", label: "📊 Data Table" },
  { key: "map", label: "🗺️ Interactive Map" },
  { key: "analysis", label: "📈 Analysis" },
  { key: "about", label: "ℹ️ About" },
];

// ─── Highlight tile ───────────────────────────────────────────────────────────

function HighlightCard({ tile }: { tile: HighlightTile }) {
  const cls =
    tile.trend === "up" ? "text-emerald-600" : tile.trend === "down" ? "text-red-600" : "text-gray-400";
  const arrow = tile.trend === "up" ? "▲" : tile.trend === "down" ? "▼" : "→";
  return (
    <div className="rounded-2xl border border-gray-100 bg-white p-4 shadow-sm">
      <p className="text-[10px] font-bold uppercase tracking-widest text-gray-400">{tile.label}</p>
      <p className="mt-1.5 truncate text-xl font-black text-gray-900">{tile.value}</p>
      <p className={`mt-1 text-xs font-bold ${cls}`}>
        {arrow} {tile.delta}
      </p>
    </div>
  );
}

// ─── Main component ───────────────────────────────────────────────────────────

export default function Dashboard() {
  const dash = useDash();
  const [date, setDate] = useState<string | null>(null);
  const [province, setProvince] = useState<string>(ALL_PROVINCES);
  const [tab, setTab] = useState<Tab>("table");

  const options = useLoader(() => dash.filterOptions(), [dash], "filter options");

  // Open on the newest week once the options arrive.
  useEffect(() => {
    if (options.data && date === null) {
      setDate(defaultDateSelection(options.data.reportDates, options.data.latest));
    }
  }, [options.data, date]);

  const rowsState = useLoader(
    date === null ? null : () => dash.rows(date, province),
    [dash, date, province],
    "dam levels",
  );

  const rows = useMemo(() => sortForDisplay(rowsState.data ?? []), [rowsState.data]);
  const highlights = useMemo(() => getChangeHighlights(rows), [rows]);
  const markerSet = useMemo(() => toMarkers(rows), [rows]);

  const selectedDate = date ?? ALL_DATES;
  const allDates = selectedDate === ALL_DATES;
  const error = options.error ?? rowsState.error;

  return (
    <AppShell>
      <div className="space-y-6">

        {/* Header */}
        <div>
          <h1 className="text-xl font-bold text-gray-900 sm:text-2xl">South Africa Dam Dashboard 💧</h1>
          <p className="mt-1 text-sm text-gray-500">Weekly dam levels across South Africa.</p>
          {error && (
            <p className="mt-2 rounded-xl border border-red-100 bg-red-50 px-3 py-2 text-xs text-red-700">
              ⚠ {error}
            </p>
          )}
        </div>

        {/* ── Filters ──────────────────────────────────────────────────── */}
        <div className="grid grid-cols-1 gap-3 sm:grid-cols-5">
          <label className="sm:col-span-2">
            <span className="text-xs font-semibold text-gray-500">📅 Report Date</span>
            <select
              value={selectedDate}
              onChange={e => setDate(e.target.value)}
              disabled={!options.data}
              className="mt-1 w-full rounded-xl border border-gray-200 bg-white px-3 py-2 text-sm"
            >
              <option value={ALL_DATES}>All</option>
              {(options.data?.reportDates ?? []).map(d => (
                <option key={d} value={d}>{formatReportDate(d)}</option>
              ))}
            </select>
          </label>

          <label className="sm:col-span-2">
            <span className="text-xs font-semibold text-gray-500">🌍 Province</span>
            <select
              value={province}
              onChange={e => setProvince(e.target.value)}
              disabled={!options.data}
              className="mt-1 w-full rounded-xl border border-gray-200 bg-white px-3 py-2 text-sm"
            >
              <option value={ALL_PROVINCES}>All</option>
              {(options.data?.provinces ?? []).map(p => (
                <option key={p} value={p}>{p}</option>
              ))}
            </select>
          </label>

          <div className="rounded-2xl border border-gray-100 bg-white px-4 py-2 shadow-sm">
            <p className="text-[10px] font-bold uppercase tracking-widest text-gray-400">Selected Date</p>
            <p className="mt-1 text-lg font-black text-gray-900">{displayDate(selectedDate)}</p>
          </div>
        </div>

        {options.loading || rowsState.loading ? (
          <div className="flex items-center gap-2 py-6 text-sm text-gray-400">
            <div className="h-3 w-3 animate-spin rounded-full border-2 border-gray-200 border-t-gray-500" />
            Fetching data…
          </div>
        ) : (
          <p className="text-sm text-gray-600">
            📊 <b>{rows.length} {allDates ? "dam reports" : "dams"}</b> found for your selection
            {allDates ? " across all dates" : ""}
          </p>
        )}

        {/* ── Highlights ───────────────────────────────────────────────── */}
        {!allDates && highlights.length > 0 && (
          <div className="grid grid-cols-1 gap-3 sm:grid-cols-2">
            {highlights.map(h => (
              <HighlightCard key={h.label} tile={h} />
            ))}
          </div>
        )}

        {/* ── Tabs ─────────────────────────────────────────────────────── */}
        <div className="flex flex-wrap gap-1 border-b border-gray-200">
          {TABS.map(t => (
            <button
              key={t.key}
              type="button"
              onClick={() => setTab(t.key)}
              className={
                tab === t.key
                  ? "border-b-2 border-[#1a2e44] px-3 py-2 text-sm font-semibold text-[#1a2e44]"
                  : "px-3 py-2 text-sm font-medium text-gray-500 hover:text-gray-800"
              }
            >
              {t.label}
            </button>
          ))}
        </div>

        {tab === "table" && (
          <section className="space-y-4">
            <h2 className="text-sm font-bold text-gray-900">📊 Dam Levels Data</h2>
            <DamTable rows={rows} columns={LEVEL_COLUMNS} />

            <h2 className="text-sm font-bold text-gray-900">🤓 Interesting Facts</h2>
            <DamTable rows={rows} columns={FACT_COLUMNS} emptyText="Additional details not available for this dataset." />

            <button
              type="button"
              onClick={() => downloadCsv(tableFileName(selectedDate), rowsToCsv(rows))}
              disabled={!rows.length}
              className="rounded-xl bg-gray-900 px-4 py-2 text-sm font-semibold text-white hover:bg-gray-800 disabled:opacity-40"
            >
              📥 Download as CSV
            </button>
          </section>
        )}

        {tab === "map" && (
          <section className="space-y-3">
            <h2 className="text-sm font-bold text-gray-900">Dam Locations Map</h2>
            {allDates ? (
              <p className="rounded-xl border border-blue-100 bg-blue-50 px-3 py-2 text-xs text-blue-700">
                ℹ️ Map view is disabled when "All" dates are selected. Please choose a specific date.
              </p>
            ) : (
              <DamMap markers={markerSet.markers} skipped={markerSet.skipped} />
            )}
          </section>
        )}

        {tab === "analysis" && (
          <section className="rounded-2xl border border-gray-100 bg-white p-6 shadow-sm">
            <h2 className="text-sm font-bold text-gray-900">📈 Historical Trends</h2>
            <p className="mt-2 text-sm text-gray-600">
              Compare water levels of several dams over a custom date range, with summary statistics and
              CSV export.
            </p>
            <Link
              to="/trends"
              className="mt-4 inline-block rounded-xl bg-blue-600 px-4 py-2 text-sm font-semibold text-white hover:bg-blue-700"
            >
              📈 View Historical Trends
            </Link>
          </section>
        )}

        {tab === "about" && (
          <section className="space-y-3 rounded-2xl border border-gray-100 bg-white p-6 text-sm text-gray-600 shadow-sm">
            <h2 className="text-sm font-bold text-gray-900">About This Dashboard</h2>
            <p>
              Weekly updates on dam levels across South Africa, with data published by the{" "}
              <a className="text-blue-600 underline" href="https://www.dws.gov.za/hydrology/Weekly/Province.aspx" target="_blank" rel="noopener noreferrer">
                Department of Water and Sanitation
              </a>.
            </p>
            <ul className="list-disc space-y-1 pl-5">
              <li><b>Weekly Change</b>: current week against the previous week (🔼 increase, 🔻 decrease).</li>
              <li><b>FSC</b>: Full Storage Capacity in million cubic meters.</li>
              <li><b>Map colours</b>: current fill percentage, see the legend on the map tab.</li>
              <li><b>Dot size</b>: proportional to storage capacity.</li>
            </ul>
          </section>
        )}
      </div>
    </AppShell>
  );
}
