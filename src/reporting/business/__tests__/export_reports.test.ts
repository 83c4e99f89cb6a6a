import type { FetchFn } from "@src/odoo/rpc_client";
import { exportReports } from "@src/reporting/business/export_reports";
import type { SubscriptionSource } from "@src/reporting/types/contracts";
import {
  ACME_DATA,
  createCapturingLogger,
  createFakeSource,
} from "@src/reporting/__tests__/fake_source";

describe("exportReports", () => {
  it("returns the report list for json", async () => {
    const outcome = await exportReports("json", {
      source: createFakeSource(ACME_DATA),
    });
    expect(outcome.ok).toBe(true);
    if (!outcome.ok || outcome.format !== "json") return;
    expect(outcome.payload.map(r => r.name)).toEqual(["SO001"]);
  });

  it("returns base64 workbook content for excel", async () => {
    const outcome = await exportReports("excel", {
      source: createFakeSource(ACME_DATA),
    });
    expect(outcome.ok).toBe(true);
    if (!outcome.ok || outcome.format !== "excel") return;
    // xlsx files are zip archives: "PK" magic bytes
    const bytes = Buffer.from(outcome.payload.fileContent, "base64");
    expect(bytes.subarray(0, 2).toString("latin1")).toBe("PK");
  });

  it("returns an empty list for json when there is no data", async () => {
    const outcome = await exportReports("json", {
      source: createFakeSource({ orders: [] }),
    });
    expect(outcome).toEqual({ ok: true, format: "json", payload: [] });
  });

  it("fails with 400 for excel when there is no data", async () => {
    const outcome = await exportReports("excel", {
      source: createFakeSource({ orders: [] }),
    });
    expect(outcome).toEqual({
      ok: false,
      status: 400,
      error: "No data available to generate Excel report.",
    });
  });

  it("fails with 400 before any request when configuration is missing", async () => {
    const fetch = jest.fn<ReturnType<FetchFn>, Parameters<FetchFn>>();
    const outcome = await exportReports("json", { env: {}, fetch });

    expect(outcome).toEqual({
      ok: false,
      status: 400,
      error:
        "Missing Odoo configuration. Ensure ODOO_URL, ODOO_DB, ODOO_UID, and ODOO_PASSWORD are set (missing: ODOO_URL, ODOO_DB, ODOO_UID, ODOO_PASSWORD).",
    });
    expect(fetch).not.toHaveBeenCalled();
  });

  it("fails with 500 on an unexpected error", async () => {
    const { logger, lines } = createCapturingLogger();
    const source: SubscriptionSource = {
      ...createFakeSource({ orders: [] }),
      fetchOrders: async () => {
        throw new Error("boom");
      },
    };

    const outcome = await exportReports("json", { source, logger });

    expect(outcome).toEqual({
      ok: false,
      status: 500,
      error: "An unexpected error occurred: boom",
    });
    expect(lines.some(line => line.level === 50)).toBe(true);
  });

  it("builds the backend source from env and treats transport failure as no data", async () => {
    const fetch = jest.fn<ReturnType<FetchFn>, Parameters<FetchFn>>(
      async () => ({ ok: false, status: 503, json: async () => ({}) })
    );
    const outcome = await exportReports("json", {
      env: {
        ODOO_URL: "https://erp.example.test/jsonrpc",
        ODOO_DB: "test-db",
        ODOO_UID: "2",
        ODOO_PASSWORD: "test-secret",
      },
      fetch,
    });

    expect(outcome).toEqual({ ok: true, format: "json", payload: [] });
    expect(fetch).toHaveBeenCalledTimes(1);
  });
});
