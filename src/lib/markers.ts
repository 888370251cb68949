import type { TableRow } from "./projector";

export type ColorBucket = "very-low" | "moderately-low" | "near-normal" | "moderately-high" | "high";

export const PALETTE: Record<ColorBucket, string> = {
  "very-low": "#e60000",
  "moderately-low": "#ffaa02",
  "near-normal": "#fffe03",
  "moderately-high": "#4de600",
  high: "#0959df",
};

export const LEGEND: readonly { bucket: ColorBucket; label: string }[] = [
  { bucket: "very-low", label: "Very Low (0-25%)" },
  { bucket: "moderately-low", label: "Moderately Low (25-50%)" },
  { bucket: "near-normal", label: "Near Normal (50-75%)" },
  { bucket: "moderately-high", label: "Moderately High (75-90%)" },
  { bucket: "high", label: "High (90%+)" },
];

export const MIN_MARKER_SIZE = 6;
export const MAX_MARKER_SIZE = 15;

export interface MarkerDescriptor {
  position: [number, number];
  colorBucket: ColorBucket;
  color: string;
  size: number;
  label: string;
  details: string[];
}

export interface MarkerSet {
  markers: MarkerDescriptor[];
  skipped: number;
}

// Lower bound inclusive, upper bound exclusive.
export function colorBucket(percent: number): ColorBucket {
  if (percent < 25) return "very-low";
  if (percent < 50) return "moderately-low";
  if (percent < 75) return "near-normal";
  if (percent < 90) return "moderately-high";
  return "high";
}

/**
 * A usable coordinate pair has exactly two non-zero numbers. A zero component
 * counts as missing data, so (0, x) never gets a marker.
 */
export function hasLocation(latLong: readonly (number | null)[] | undefined): latLong is [number, number] {
  if (!latLong || latLong.length !== 2) return false;
  const [lat, lon] = latLong;
  return typeof lat === "number" && typeof lon === "number" && !!lat && !!lon;
}

/** Scales capacities linearly onto [MIN_MARKER_SIZE, MAX_MARKER_SIZE] over the given rows. */
export function markerSizer(rows: readonly TableRow[]): (fscMillions: number | undefined) => number {
  const caps = rows.map(r => r.fscMillions).filter((v): v is number => v !== undefined);
  const min = caps.length ? Math.min(...caps) : 0;
  const max = caps.length ? Math.max(...caps) : 0;

  return fsc => {
    const t = fsc !== undefined && max > min ? (fsc - min) / (max - min) : 0;
    return MIN_MARKER_SIZE + (MAX_MARKER_SIZE - MIN_MARKER_SIZE) * t;
  };
}

export function toMarkers(rows: readonly TableRow[]): MarkerSet {
  const sizeOf = markerSizer(rows);
  const markers: MarkerDescriptor[] = [];
  let skipped = 0;

  for (const row of rows) {
    const latLong = row.latLong;
    if (!hasLocation(latLong)) {
      skipped++;
      continue;
    }
    const bucket = row.thisWeek !== undefined ? colorBucket(row.thisWeek) : "very-low";
    markers.push({
      position: [latLong[0], latLong[1]],
      colorBucket: bucket,
      color: PALETTE[bucket],
      size: sizeOf(row.fscMillions),
      label: row.dam ?? "Unnamed dam",
      details: [`Current: ${row.thisWeek ?? "—"}%`, `River: ${row.river ?? "—"}`],
    });
  }

  return { markers, skipped };
}
