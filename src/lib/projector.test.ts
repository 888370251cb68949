import { describe, expect, it } from "vitest";
import { ALL_DATES, ALL_PROVINCES } from "./filters";
import { StoreUnavailable } from "./errors";
import { buildReportQuery, formatChange, projectRows, sortForDisplay, toTableRow } from "./projector";
import { MemoryReportStore } from "../test/memoryReportStore";
import { WEEK_1, WEEK_2, report } from "../test/fixtures";

describe("formatChange", () => {
  it("marks rises, falls and no change", () => {
    expect(formatChange(20)).toBe("🔼 20.0%");
    expect(formatChange(-1)).toBe("🔻 1.0%");
    expect(formatChange(3.24)).toBe("🔼 3.2%");
    expect(formatChange(0)).toBe("◼ 0%");
    expect(formatChange(undefined)).toBe("◼ 0%");
  });
});

describe("toTableRow", () => {
  it("derives change columns and rescales capacity", () => {
    const row = toTableRow(report({ dam: "A", this_week: 80, last_week: 60, full_storage_capacity: 480_250_000 }));
    expect(row.change).toBe("🔼 20.0%");
    expect(row.changeNumeric).toBe(20);
    expect(row.fscMillions).toBe(480.25);
    expect(row).not.toHaveProperty("lastWeek");
  });

  it("reports no change for equal weeks", () => {
    const row = toTableRow(report({ dam: "B", this_week: 40, last_week: 40 }));
    expect(row.change).toBe("◼ 0%");
    expect(row.changeNumeric).toBe(0);
  });

  it("keeps a row with missing fields", () => {
    const row = toTableRow({ dam: "Sparse", last_week: 12 });
    expect(row).toEqual({
      dam: "Sparse",
      province: undefined,
      river: undefined,
      nearestLocale: undefined,
      reportDate: undefined,
      fscMillions: undefined,
      thisWeek: undefined,
      lastYear: undefined,
      wallHeightM: undefined,
      yearCompleted: undefined,
      latLong: undefined,
      change: "◼ 0%",
      changeNumeric: undefined,
    });
  });

  it("handles percentages outside 0-100", () => {
    const row = toTableRow(report({ this_week: 104.5, last_week: -2 }));
    expect(row.change).toBe("🔼 106.5%");
  });
});

describe("projectRows", () => {
  const reports = [
    report({ dam: "A", province: "Gauteng", report_date: WEEK_2 }),
    report({ dam: "B", province: "Limpopo", report_date: WEEK_2 }),
    report({ dam: "A", province: "Gauteng", report_date: WEEK_1 }),
  ];

  it("omits the filters for the all sentinels", () => {
    expect(buildReportQuery(ALL_DATES, ALL_PROVINCES)).toEqual({});
    expect(buildReportQuery(WEEK_2, "Limpopo")).toEqual({ reportDate: WEEK_2, province: "Limpopo" });
  });

  it("narrows by date and province", async () => {
    const store = new MemoryReportStore(reports);
    const rows = await projectRows(store, WEEK_2, "Gauteng");
    expect(rows.map(r => [r.dam, r.reportDate])).toEqual([["A", WEEK_2]]);
  });

  it("returns every report across dates in fetch order", async () => {
    const rows = await projectRows(new MemoryReportStore(reports), ALL_DATES, ALL_PROVINCES);
    expect(rows.map(r => `${r.dam}@${r.reportDate}`)).toEqual([`A@${WEEK_2}`, `B@${WEEK_2}`, `A@${WEEK_1}`]);
  });

  it("returns an empty list when nothing matches", async () => {
    expect(await projectRows(new MemoryReportStore(reports), "2020-01-06", ALL_PROVINCES)).toEqual([]);
  });

  it("fails when the store is down", async () => {
    const store = new MemoryReportStore(reports);
    store.failWith = new Error("timeout");
    await expect(projectRows(store, WEEK_2, ALL_PROVINCES)).rejects.toBeInstanceOf(StoreUnavailable);
  });
});

describe("sortForDisplay", () => {
  it("orders by province then fullest first", () => {
    const rows = [
      toTableRow(report({ dam: "L1", province: "Limpopo", this_week: 40 })),
      toTableRow(report({ dam: "G1", province: "Gauteng", this_week: 30 })),
      toTableRow(report({ dam: "L2", province: "Limpopo", this_week: 90 })),
      toTableRow(report({ dam: "G2", province: "Gauteng", this_week: undefined })),
      toTableRow(report({ dam: "X", province: undefined, this_week: 99 })),
      toTableRow(report({ dam: "G3", province: "Gauteng", this_week: 75 })),
    ];
    expect(sortForDisplay(rows).map(r => r.dam)).toEqual(["G3", "G1", "G2", "L2", "L1", "X"]);
  });
});
