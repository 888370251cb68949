import type { TableRow } from "./projector";

export type ChangeTrend = "up" | "down" | "flat";

export type HighlightTile = {
  label: string;
  value: string;
  delta: string;
  trend: ChangeTrend;
};

export interface ChangeHighlights {
  biggestIncrease: TableRow;
  biggestDecrease: TableRow;
}

/** Rows with the largest and smallest weekly change; first one wins a tie. */
export function changeHighlights(rows: readonly TableRow[]): ChangeHighlights | undefined {
  let up: TableRow | undefined;
  let down: TableRow | undefined;
  for (const row of rows) {
    const d = row.changeNumeric;
    if (d === undefined || Number.isNaN(d)) continue;
    if (!up || d > (up.changeNumeric ?? d)) up = row;
    if (!down || d < (down.changeNumeric ?? d)) down = row;
  }
  return up && down ? { biggestIncrease: up, biggestDecrease: down } : undefined;
}

function trendOf(d: number): ChangeTrend {
  if (d > 0) return "up";
  if (d < 0) return "down";
  return "flat";
}

function tile(label: string, row: TableRow): HighlightTile {
  const d = row.changeNumeric ?? 0;
  return {
    label,
    value: row.dam ?? "Unnamed dam",
    delta: `${d.toFixed(1)}%`,
    trend: trendOf(d),
  };
}

export function getChangeHighlights(rows: readonly TableRow[]): HighlightTile[] {
  const h = changeHighlights(rows);
  if (!h) return [];
  return [tile("Biggest Increase", h.biggestIncrease), tile("Biggest Decrease", h.biggestDecrease)];
}
