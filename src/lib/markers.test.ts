import { describe, expect, it } from "vitest";
import { colorBucket, hasLocation, markerSizer, MIN_MARKER_SIZE, PALETTE, toMarkers } from "./markers";
import { toTableRow, type TableRow } from "./projector";
import { report } from "../test/fixtures";

describe("colorBucket", () => {
  it("puts boundaries in the upper bucket", () => {
    expect(colorBucket(24.999)).toBe("very-low");
    expect(colorBucket(25)).toBe("moderately-low");
    expect(colorBucket(49.9)).toBe("moderately-low");
    expect(colorBucket(50)).toBe("near-normal");
    expect(colorBucket(75)).toBe("moderately-high");
    expect(colorBucket(89.99)).toBe("moderately-high");
    expect(colorBucket(90)).toBe("high");
  });

  it("accepts values outside 0-100", () => {
    expect(colorBucket(-5)).toBe("very-low");
    expect(colorBucket(130)).toBe("high");
  });
});

describe("hasLocation", () => {
  it("requires two non-zero numbers", () => {
    expect(hasLocation([-33.9, 18.4])).toBe(true);
    expect(hasLocation(undefined)).toBe(false);
    expect(hasLocation([-33.9])).toBe(false);
    expect(hasLocation([-33.9, 18.4, 2])).toBe(false);
    expect(hasLocation([-33.9, null])).toBe(false);
    expect(hasLocation([0, -28])).toBe(false);
    expect(hasLocation([0, 0])).toBe(false);
  });
});

describe("markerSizer", () => {
  it("interpolates between 6 and 15", () => {
    const rows: TableRow[] = [
      { change: "", fscMillions: 10 },
      { change: "", fscMillions: 55 },
      { change: "", fscMillions: 100 },
    ];
    const size = markerSizer(rows);
    expect(size(10)).toBe(6);
    expect(size(55)).toBe(10.5);
    expect(size(100)).toBe(15);
    expect(size(undefined)).toBe(6);
  });

  it("collapses to the minimum size when capacities are equal", () => {
    const rows: TableRow[] = [
      { change: "", fscMillions: 42 },
      { change: "", fscMillions: 42 },
    ];
    const size = markerSizer(rows);
    expect(rows.map(r => size(r.fscMillions))).toEqual([MIN_MARKER_SIZE, MIN_MARKER_SIZE]);
    expect(markerSizer([])(undefined)).toBe(MIN_MARKER_SIZE);
  });
});

describe("toMarkers", () => {
  const rows = [
    toTableRow(report({ dam: "A", this_week: 80, last_week: 60, river: "Berg", full_storage_capacity: 10e6 })),
    toTableRow(report({ dam: "B", this_week: 40, last_week: 40, full_storage_capacity: 100e6 })),
    toTableRow(report({ dam: "Equator", lat_long: [0, -28] })),
    toTableRow(report({ dam: "Nowhere", lat_long: undefined })),
    toTableRow(report({ dam: "Short", lat_long: [-29.1] })),
  ];

  it("emits one marker per located row and counts the rest", () => {
    const { markers, skipped } = toMarkers(rows);
    expect(skipped).toBe(3);
    expect(markers).toHaveLength(rows.length - skipped);
  });

  it("colours and sizes markers", () => {
    const { markers } = toMarkers(rows);
    expect(markers[0]).toEqual({
      position: [-33.5, 19.2],
      colorBucket: "moderately-high",
      color: PALETTE["moderately-high"],
      size: 6,
      label: "A",
      details: ["Current: 80%", "River: Berg"],
    });
    expect(markers[1].colorBucket).toBe("moderately-low");
    expect(markers[1].size).toBe(15);
  });

  it("does not depend on row order", () => {
    const forward = toMarkers(rows).markers;
    const backward = toMarkers([...rows].reverse()).markers;
    expect([...backward].reverse()).toEqual(forward);
  });
});
