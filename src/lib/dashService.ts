import { TtlCache } from "./cache";
import {
  latestReportDate,
  listDams,
  listProvinces,
  listReportDates,
  reportDateRange,
  type DateSelection,
  type ProvinceSelection,
  type ReportDateRange,
} from "./filters";
import { projectRows, type TableRow } from "./projector";
import type { ReportStore } from "./reportStore";
import { aggregateTrends, type TrendResult } from "./trends";

const MINUTE = 60_000;

export const CACHE_TTL = {
  filterOptions: 10 * MINUTE,
  rows: 20_000,
  trends: 5 * MINUTE,
} as const;

export interface FilterOptions {
  reportDates: string[];
  provinces: string[];
  latest?: string;
}

export interface DashService {
  filterOptions(): Promise<FilterOptions>;
  rows(date: DateSelection, province: ProvinceSelection): Promise<TableRow[]>;
  dams(): Promise<string[]>;
  dateRange(): Promise<ReportDateRange | undefined>;
  trends(damNames: readonly string[], start: string, end: string): Promise<TrendResult>;
}

export interface DashServiceOptions {
  ttl?: Partial<Record<keyof typeof CACHE_TTL, number>>;
  now?: () => number;
}

/** Binds the pipeline to one store, with an independent cache per operation. */
export function createDashService(store: ReportStore, options: DashServiceOptions = {}): DashService {
  const ttl = { ...CACHE_TTL, ...options.ttl };
  const filterCache = new TtlCache<FilterOptions>(ttl.filterOptions, options.now);
  const rowCache = new TtlCache<TableRow[]>(ttl.rows, options.now);
  const damCache = new TtlCache<string[]>(ttl.trends, options.now);
  const rangeCache = new TtlCache<ReportDateRange | undefined>(ttl.trends, options.now);
  const trendCache = new TtlCache<TrendResult>(ttl.trends, options.now);

  return {
    filterOptions: () =>
      filterCache.getOrLoad("options", async () => {
        const [reportDates, provinces, latest] = await Promise.all([
          listReportDates(store),
          listProvinces(store),
          latestReportDate(store),
        ]);
        return { reportDates, provinces, latest };
      }),
    rows: (date, province) =>
      rowCache.getOrLoad(JSON.stringify([date, province]), () => projectRows(store, date, province)),
    dams: () => damCache.getOrLoad("dams", () => listDams(store)),
    dateRange: () => rangeCache.getOrLoad("range", () => reportDateRange(store)),
    trends: (damNames, start, end) =>
      trendCache.getOrLoad(JSON.stringify([damNames, start, end]), () =>
        aggregateTrends(store, damNames, start, end),
      ),
  };
}
