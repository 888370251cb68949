import type { Report } from "../lib/reportStore";

export const WEEK_1 = "2025-02-03";
export const WEEK_2 = "2025-02-10";
export const WEEK_3 = "2025-02-17";

export function report(overrides: Report): Report {
  return {
    province: "Western Cape",
    river: "Test River",
    nearest_locale: "Testville",
    report_date: WEEK_2,
    full_storage_capacity: 100_000_000,
    this_week: 50,
    last_week: 50,
    last_year: 45,
    wall_height_m: 30,
    year_completed: 1980,
    lat_long: [-33.5, 19.2],
    ...overrides,
  };
}
