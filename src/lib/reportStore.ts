import { z } from "zod";
import { toIsoDate } from "./week";

// Every field may be missing or mistyped in a stored document; a bad field
// reads as absent instead of failing the whole query.
const optionalString = z.string().optional().catch(undefined);
const optionalNumber = z.number().finite().optional().catch(undefined);

export const reportSchema = z
  .object({
    dam: optionalString,
    province: optionalString,
    river: optionalString,
    nearest_locale: optionalString,
    report_date: z.string().transform(toIsoDate).optional().catch(undefined),
    full_storage_capacity: optionalNumber,
    this_week: optionalNumber,
    last_week: optionalNumber,
    last_year: optionalNumber,
    wall_height_m: optionalNumber,
    year_completed: z.number().int().optional().catch(undefined),
    lat_long: z.array(z.number().nullable()).optional().catch(undefined),
  })
  .catch({});

/** One dam's weekly measurement document. */
export type Report = z.infer<typeof reportSchema>;

export type ReportField = keyof Report;

export function parseReport(raw: unknown): Report {
  return reportSchema.parse(raw);
}

/** Exact-match and range filters; an omitted key does not filter. */
export interface ReportQuery {
  reportDate?: string;
  province?: string;
  dams?: readonly string[];
  reportDateFrom?: string;
  reportDateTo?: string;
}

export type DistinctField = "report_date" | "province" | "dam";

export type SortDirection = "asc" | "desc";

/**
 * Read-only query contract over the weekly reports collection. Implementations
 * throw StoreUnavailable when the backing store cannot answer.
 */
export interface ReportStore {
  find(query: ReportQuery, fields: readonly ReportField[]): Promise<Report[]>;
  distinct(field: DistinctField): Promise<string[]>;
  /** First report when ordered by report_date in the given direction. */
  findOne(direction: SortDirection, fields: readonly ReportField[]): Promise<Report | undefined>;
}
