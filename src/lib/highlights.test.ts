import { describe, expect, it } from "vitest";
import { changeHighlights, getChangeHighlights } from "./highlights";
import { toTableRow } from "./projector";
import { report } from "../test/fixtures";

describe("change highlights", () => {
  const rows = [
    toTableRow(report({ dam: "Flat", this_week: 50, last_week: 50 })),
    toTableRow(report({ dam: "Riser", this_week: 72.5, last_week: 60 })),
    toTableRow(report({ dam: "Faller", this_week: 31, last_week: 40 })),
    toTableRow(report({ dam: "Riser Too", this_week: 22.5, last_week: 10 })),
    toTableRow(report({ dam: "Unknown", this_week: 10, last_week: undefined })),
  ];

  it("picks the extremes, first on ties", () => {
    const h = changeHighlights(rows);
    expect(h?.biggestIncrease.dam).toBe("Riser");
    expect(h?.biggestDecrease.dam).toBe("Faller");
  });

  it("formats metric tiles", () => {
    expect(getChangeHighlights(rows)).toEqual([
      { label: "Biggest Increase", value: "Riser", delta: "12.5%", trend: "up" },
      { label: "Biggest Decrease", value: "Faller", delta: "-9.0%", trend: "down" },
    ]);
  });

  it("is empty without computable changes", () => {
    expect(changeHighlights([])).toBeUndefined();
    expect(getChangeHighlights([toTableRow({ dam: "Lonely", this_week: 20 })])).toEqual([]);
  });
});
