// @vitest-environment jsdom
import { describe, expect, it, vi } from "vitest";
import { StoreUnavailable } from "./errors";
import { createReportStore } from "./supabaseClient";

const config = {
  supabaseUrl: "http://localhost:54321",
  supabaseAnonKey: "test-anon-key",
  reportsTable: "reports",
};

type Reply = (url: URL) => Response;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

// Stands in for PostgREST: records each request URL and answers from `reply`.
function fakeFetch(reply: Reply) {
  const urls: URL[] = [];
  const fetch = vi.fn(async (input: RequestInfo | URL) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    urls.push(url);
    return reply(url);
  });
  return { fetch, urls };
}

describe("SupabaseReportStore", () => {
  it("sends exact-match filters and parses documents", async () => {
    const { fetch, urls } = fakeFetch(() =>
      json([{ dam: "Vaal", report_date: "2025-02-10", this_week: 80, lat_long: [-26.9, 28.1], river: null }]),
    );
    const store = createReportStore(config, { fetch });

    const rows = await store.find({ reportDate: "2025-02-10", province: "Gauteng" }, ["dam", "report_date", "this_week", "lat_long", "river"]);

    expect(rows).toEqual([{ dam: "Vaal", report_date: "2025-02-10", this_week: 80, lat_long: [-26.9, 28.1] }]);
    expect(urls).toHaveLength(1);
    expect(urls[0].pathname).toBe("/rest/v1/reports");
    expect(urls[0].searchParams.get("select")).toBe("dam,report_date,this_week,lat_long,river");
    expect(urls[0].searchParams.get("report_date")).toBe("eq.2025-02-10");
    expect(urls[0].searchParams.get("province")).toBe("eq.Gauteng");
    expect(urls[0].searchParams.get("offset")).toBe("0");
    expect(urls[0].searchParams.get("limit")).toBe("1000");
  });

  it("filters by dam set and inclusive date range", async () => {
    const { fetch, urls } = fakeFetch(() => json([]));
    const store = createReportStore(config, { fetch });

    await store.find({ dams: ["Vaal", "Gariep"], reportDateFrom: "2025-01-06", reportDateTo: "2025-02-10" }, ["dam"]);

    expect(urls[0].searchParams.get("dam")).toBe("in.(Vaal,Gariep)");
    expect(urls[0].searchParams.getAll("report_date")).toEqual(["gte.2025-01-06", "lte.2025-02-10"]);
  });

  it("pages through large results", async () => {
    const { fetch, urls } = fakeFetch(url => {
      const offset = Number(url.searchParams.get("offset"));
      const count = offset === 0 ? 1000 : 2;
      return json(Array.from({ length: count }, (_, i) => ({ dam: `D${offset + i}` })));
    });
    const store = createReportStore(config, { fetch });

    const rows = await store.find({}, ["dam"]);

    expect(rows).toHaveLength(1002);
    expect(rows[1001]).toEqual({ dam: "D1001" });
    expect(urls.map(u => u.searchParams.get("offset"))).toEqual(["0", "1000"]);
    expect(urls.map(u => u.searchParams.get("order"))).toEqual(["report_date.asc,dam.asc", "report_date.asc,dam.asc"]);
  });

  it("collects distinct values", async () => {
    const { fetch, urls } = fakeFetch(() =>
      json([{ report_date: "2025-02-10" }, { report_date: "2025-02-10T00:00:00" }, { report_date: "2025-02-03" }, {}]),
    );
    const store = createReportStore(config, { fetch });

    expect(await store.distinct("report_date")).toEqual(["2025-02-10", "2025-02-03"]);
    expect(urls[0].searchParams.get("select")).toBe("report_date");
  });

  it("finds the newest report", async () => {
    const { fetch, urls } = fakeFetch(() => json([{ report_date: "2025-02-17" }]));
    const store = createReportStore(config, { fetch });

    expect(await store.findOne("desc", ["report_date"])).toEqual({ report_date: "2025-02-17" });
    expect(urls[0].searchParams.get("order")).toBe("report_date.desc.nullslast");
    expect(urls[0].searchParams.get("limit")).toBe("1");
  });

  it("returns nothing from an empty table", async () => {
    const { fetch } = fakeFetch(() => json([]));
    expect(await createReportStore(config, { fetch }).findOne("asc", ["report_date"])).toBeUndefined();
  });

  it("raises StoreUnavailable on a query error", async () => {
    const { fetch } = fakeFetch(() => json({ message: 'relation "reports" does not exist', code: "42P01" }, 404));
    const store = createReportStore(config, { fetch });

    const failure = store.distinct("province");
    await expect(failure).rejects.toBeInstanceOf(StoreUnavailable);
    await expect(failure).rejects.toThrow('relation "reports" does not exist');
  });

  it("raises StoreUnavailable when the network is down", async () => {
    const fetch = vi.fn(async () => {
      throw new TypeError("fetch failed");
    });
    const store = createReportStore(config, { fetch });

    await expect(store.find({}, ["dam"])).rejects.toBeInstanceOf(StoreUnavailable);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("sends a failed read only once", async () => {
    const { fetch, urls } = fakeFetch(() => json({ message: "Service Unavailable" }, 503));
    const store = createReportStore(config, { fetch });

    await expect(store.distinct("dam")).rejects.toBeInstanceOf(StoreUnavailable);
    await expect(store.findOne("desc", ["report_date"])).rejects.toBeInstanceOf(StoreUnavailable);
    expect(urls).toHaveLength(2);
  });
});
