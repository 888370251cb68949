import { describe, expect, it } from "vitest";
import { formatDateRangeLabel, formatReportDate, isIsoDate, shiftIsoDate, toIsoDate } from "./week";

describe("week helpers", () => {
  it("formats report dates as DD Mon YYYY", () => {
    expect(formatReportDate("2025-02-10")).toBe("10 Feb 2025");
    expect(formatReportDate("2024-09-02T00:00:00+00:00")).toBe("02 Sep 2024");
  });

  it("trims timestamps to a date", () => {
    expect(toIsoDate("2025-02-10T08:30:00Z")).toBe("2025-02-10");
    expect(toIsoDate("not a date")).toBe("not a date");
  });

  it("validates calendar dates", () => {
    expect(isIsoDate("2025-02-28")).toBe(true);
    expect(isIsoDate("2025-02-30")).toBe(false);
    expect(isIsoDate("10/02/2025")).toBe(false);
  });

  it("shifts across month and year boundaries", () => {
    expect(shiftIsoDate("2025-03-01", -1)).toBe("2025-02-28");
    expect(shiftIsoDate("2025-01-10", -180)).toBe("2024-07-14");
  });

  it("labels ranges", () => {
    expect(formatDateRangeLabel("2025-02-03", "2025-02-03")).toBe("03 Feb 2025");
    expect(formatDateRangeLabel("2025-02-03", "2025-02-17")).toBe("03–17 Feb 2025");
    expect(formatDateRangeLabel("2025-01-27", "2025-02-17")).toBe("27 Jan–17 Feb 2025");
    expect(formatDateRangeLabel("2024-12-30", "2025-01-06")).toBe("30 Dec 2024–06 Jan 2025");
  });
});
