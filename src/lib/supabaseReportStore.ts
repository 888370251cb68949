import type { SupabaseClient } from "@supabase/supabase-js";
import { StoreUnavailable } from "./errors";
import {
  parseReport,
  type DistinctField,
  type Report,
  type ReportField,
  type ReportQuery,
  type ReportStore,
  type SortDirection,
} from "./reportStore";

// PostgREST caps a response at 1000 rows by default.
const PAGE_SIZE = 1000;

export class SupabaseReportStore implements ReportStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table = "reports",
  ) {}

  async find(query: ReportQuery, fields: readonly ReportField[]): Promise<Report[]> {
    const rows = await this.readAll(fields.join(","), query);
    return rows.map(parseReport);
  }

  async distinct(field: DistinctField): Promise<string[]> {
    const rows = await this.readAll(field, {});
    const values = new Set<string>();
    for (const row of rows) {
      const v = parseReport(row)[field];
      if (v !== undefined) values.add(v);
    }
    return Array.from(values);
  }

  async findOne(direction: SortDirection, fields: readonly ReportField[]): Promise<Report | undefined> {
    const { data, error } = await this.run(() =>
      this.client
        .from(this.table)
        .select(fields.join(","))
        .not("report_date", "is", null)
        .order("report_date", { ascending: direction === "asc", nullsFirst: false })
        .limit(1)
        .retry(false),
    );
    if (error) throw this.failure(error.message, error);
    const rows: unknown[] = Array.isArray(data) ? data : [];
    return rows.length ? parseReport(rows[0]) : undefined;
  }

  private async readAll(columns: string, query: ReportQuery): Promise<unknown[]> {
    const out: unknown[] = [];
    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.run(() => {
        let request = this.client.from(this.table).select(columns);
        if (query.reportDate !== undefined) request = request.eq("report_date", query.reportDate);
        if (query.province !== undefined) request = request.eq("province", query.province);
        if (query.dams !== undefined) request = request.in("dam", [...query.dams]);
        if (query.reportDateFrom !== undefined) request = request.gte("report_date", query.reportDateFrom);
        if (query.reportDateTo !== undefined) request = request.lte("report_date", query.reportDateTo);
        // Pages only line up under a total order.
        return request
          .order("report_date")
          .order("dam")
          .range(from, from + PAGE_SIZE - 1)
          .retry(false);
      });
      if (error) throw this.failure(error.message, error);

      const page: unknown[] = Array.isArray(data) ? data : [];
      out.push(...page);
      if (page.length < PAGE_SIZE) return out;
    }
  }

  // supabase-js reports most failures in `error`, but a broken fetch can still throw.
  // Every request opts out of the client's GET retries: one failure, one error.
  private async run<R>(request: () => PromiseLike<R>): Promise<R> {
    try {
      return await request();
    } catch (e) {
      throw this.failure(e instanceof Error ? e.message : String(e), e);
    }
  }

  private failure(message: string, cause: unknown): StoreUnavailable {
    console.error(`Report store query on "${this.table}" failed:`, message);
    return new StoreUnavailable(`Report store unavailable: ${message}`, { cause });
  }
}
