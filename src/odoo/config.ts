import { z } from "zod";
import { ConfigurationError, errorMessage } from "../util/errors";
import { getNumber } from "../util/env";

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface OdooConfig {
  url: string;
  db: string;
  uid: number;
  password: string;
  timeoutMs: number;
}

const REQUIRED_VARS = ["ODOO_URL", "ODOO_DB", "ODOO_UID", "ODOO_PASSWORD"];

const ConfigSchema = z.object({
  ODOO_URL: z.string().url(),
  ODOO_DB: z.string().min(1),
  ODOO_UID: z
    .string()
    .regex(/^\d+$/, "must be a positive integer")
    .transform(Number)
    .refine(uid => uid > 0, "must be a positive integer"),
  ODOO_PASSWORD: z.string().min(1),
});

/**
 * Reads the backend connection settings. Fails fast: nothing talks to the
 * backend until all four required variables are present and well formed.
 */
export function loadOdooConfig(
  env: Record<string, string | undefined> = process.env
): OdooConfig {
  const missing = REQUIRED_VARS.filter(name => !env[name]);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing Odoo configuration. Ensure ODOO_URL, ODOO_DB, ODOO_UID, and ODOO_PASSWORD are set (missing: ${missing.join(", ")}).`,
      missing
    );
  }

  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const invalid = [
      ...new Set(parsed.error.issues.map(issue => String(issue.path[0]))),
    ];
    const details = [
      ...new Set(
        parsed.error.issues.map(
          issue => `${String(issue.path[0])} ${issue.message}`
        )
      ),
    ].join("; ");
    throw new ConfigurationError(
      `Invalid Odoo configuration: ${details}`,
      invalid
    );
  }

  let timeoutMs: number;
  try {
    timeoutMs =
      getNumber("ODOO_TIMEOUT_MS", DEFAULT_TIMEOUT_MS, env) ??
      DEFAULT_TIMEOUT_MS;
  } catch (error) {
    throw new ConfigurationError(
      errorMessage(error),
      ["ODOO_TIMEOUT_MS"]
    );
  }

  return {
    url: parsed.data.ODOO_URL,
    db: parsed.data.ODOO_DB,
    uid: parsed.data.ODOO_UID,
    password: parsed.data.ODOO_PASSWORD,
    timeoutMs,
  };
}
