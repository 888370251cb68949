import {
  Chart as ChartJS,
  LineElement,
  CategoryScale,
  LinearScale,
  PointElement,
  Tooltip,
  Legend,
  type ChartData,
  type ChartOptions,
} from "chart.js";
import { Line } from "react-chartjs-2";
import { useMemo } from "react";
import { REFERENCE_LINES, damDetails, type TrendPoint } from "../lib/trends";
import { formatReportDate } from "../lib/week";

ChartJS.register(LineElement, CategoryScale, LinearScale, PointElement, Tooltip, Legend);

const DAM_COLORS = ["#2563EB", "#F59E0B", "#0D9488", "#DB2777", "#7C3AED", "#06B6D4", "#65A30D", "#EA580C"];

export function buildTrendData(series: readonly TrendPoint[]): ChartData<"line", (number | null)[], string> {
  const dates = Array.from(new Set(series.map(p => p.reportDate))).sort();
  const index = new Map(dates.map((d, i) => [d, i]));
  const dams = Array.from(new Set(series.map(p => p.dam)));

  const damSets = dams.map((dam, i) => {
    const data: (number | null)[] = dates.map(() => null);
    for (const p of series) {
      const at = index.get(p.reportDate);
      if (p.dam === dam && at !== undefined) data[at] = p.percent;
    }
    const color = DAM_COLORS[i % DAM_COLORS.length];
    return {
      label: dam,
      data,
      borderColor: color,
      backgroundColor: color,
      spanGaps: true,
      tension: 0.3,
      pointRadius: 2,
      pointHoverRadius: 4,
      borderWidth: 2,
    };
  });

  const referenceSets = REFERENCE_LINES.map(line => ({
    label: line.label,
    data: dates.map(() => line.value),
    borderColor: line.color,
    backgroundColor: "transparent",
    borderDash: [6, 6],
    borderWidth: 1,
    pointRadius: 0,
    pointHoverRadius: 0,
  }));

  return { labels: dates.map(formatReportDate), datasets: [...damSets, ...referenceSets] };
}

export default function TrendChart({ series }: { series: readonly TrendPoint[] }) {
  const data = useMemo(() => buildTrendData(series), [series]);
  const details = useMemo(() => damDetails(series), [series]);

  const options: ChartOptions<"line"> = useMemo(() => ({
    responsive: true,
    maintainAspectRatio: false,
    interaction: { mode: "index", intersect: false },
    plugins: {
      legend: { position: "top", align: "end", labels: { boxWidth: 12, font: { size: 11 } } },
      tooltip: {
        callbacks: {
          label: ctx => {
            const dam = ctx.dataset.label ?? "";
            const detail = details.get(dam);
            return `${dam}: ${ctx.parsed.y}%${detail ? ` (${detail})` : ""}`;
          },
        },
      },
    },
    scales: {
      y: { beginAtZero: true, suggestedMax: 100, title: { display: true, text: "Water Level (%)" }, ticks: { callback: v => `${v}%` }, grid: { color: "rgba(0,0,0,0.05)" } },
      x: { title: { display: true, text: "Date" }, grid: { display: false }, ticks: { maxRotation: 30, autoSkip: true, font: { size: 10 } } },
    },
  }), [details]);

  return (
    <div className="h-[420px]">
      <Line data={data} options={options} />
    </div>
  );
}
