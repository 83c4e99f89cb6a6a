import { loadOdooConfig } from "@src/odoo/config";
import { ConfigurationError } from "@src/util/errors";

const VALID_ENV = {
  ODOO_URL: "https://erp.example.test/jsonrpc",
  ODOO_DB: "test-db",
  ODOO_UID: "2",
  ODOO_PASSWORD: "test-secret",
};

function captureError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error("expected ConfigurationError");
}

describe("loadOdooConfig", () => {
  it("parses a complete environment", () => {
    expect(loadOdooConfig(VALID_ENV)).toEqual({
      url: "https://erp.example.test/jsonrpc",
      db: "test-db",
      uid: 2,
      password: "test-secret",
      timeoutMs: 30000,
    });
  });

  it("names every missing variable", () => {
    const err = captureError(() =>
      loadOdooConfig({ ODOO_URL: VALID_ENV.ODOO_URL, ODOO_UID: "2" })
    );
    expect(err.missing).toEqual(["ODOO_DB", "ODOO_PASSWORD"]);
    expect(err.message).toBe(
      "Missing Odoo configuration. Ensure ODOO_URL, ODOO_DB, ODOO_UID, and ODOO_PASSWORD are set (missing: ODOO_DB, ODOO_PASSWORD)."
    );
  });

  it("treats empty strings as missing", () => {
    const err = captureError(() =>
      loadOdooConfig({ ...VALID_ENV, ODOO_PASSWORD: "" })
    );
    expect(err.missing).toEqual(["ODOO_PASSWORD"]);
  });

  it("rejects a non-numeric or zero user id", () => {
    expect(
      captureError(() => loadOdooConfig({ ...VALID_ENV, ODOO_UID: "admin" }))
        .missing
    ).toEqual(["ODOO_UID"]);
    expect(
      captureError(() => loadOdooConfig({ ...VALID_ENV, ODOO_UID: "0" }))
        .missing
    ).toEqual(["ODOO_UID"]);
  });

  it("rejects a malformed endpoint URL", () => {
    const err = captureError(() =>
      loadOdooConfig({ ...VALID_ENV, ODOO_URL: "not a url" })
    );
    expect(err.missing).toEqual(["ODOO_URL"]);
    expect(err.message).toMatch(/^Invalid Odoo configuration: ODOO_URL /);
  });

  it("reads an optional timeout override", () => {
    expect(
      loadOdooConfig({ ...VALID_ENV, ODOO_TIMEOUT_MS: "5000" }).timeoutMs
    ).toBe(5000);
    expect(
      captureError(() =>
        loadOdooConfig({ ...VALID_ENV, ODOO_TIMEOUT_MS: "soon" })
      ).missing
    ).toEqual(["ODOO_TIMEOUT_MS"]);
  });
});
