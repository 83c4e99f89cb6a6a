/**
 * Export use case shared by the HTTP handlers and the CLI.
 * Maps failures to a status-tagged outcome instead of throwing.
 */
import { z } from "zod";
import { renderWorkbookBase64 } from "../../export/excel_renderer";
import { loadOdooConfig } from "../../odoo/config";
import { OdooRpcClient, type FetchFn } from "../../odoo/rpc_client";
import { getLogger, type Logger } from "../../util/logger";
import { createOdooSubscriptionRepository } from "../db/odoo_subscription_repository";
import { ConfigurationError, errorMessage } from "../../util/errors";
import { EmptyReportError } from "../errors";
import type { SubscriptionSource } from "../types/contracts";
import type { Report } from "../types/domain";
import { generateSubscriptionReports } from "./generate_subscription_reports";

export const ReportFormatSchema = z.enum(["json", "excel"]);
export type ReportFormat = z.infer<typeof ReportFormatSchema>;

export interface ExcelPayload {
  fileContent: string;
}

export type ExportOutcome =
  | { ok: true; format: "json"; payload: Report[] }
  | { ok: true; format: "excel"; payload: ExcelPayload }
  | { ok: false; status: 400 | 500; error: string };

export interface ExportDependencies {
  /** Overrides the backend-backed source built from `env`. */
  source?: SubscriptionSource;
  env?: Record<string, string | undefined>;
  fetch?: FetchFn;
  logger?: Logger;
}

/**
 * Builds a fresh client and repository from the environment. Throws
 * ConfigurationError before any network call when settings are missing.
 */
export function createSubscriptionSource(
  deps: Omit<ExportDependencies, "source"> = {}
): SubscriptionSource {
  const config = loadOdooConfig(deps.env);
  const client = new OdooRpcClient(config, {
    fetch: deps.fetch,
    logger: deps.logger?.child({ module: "odoo/rpc_client" }),
  });
  return createOdooSubscriptionRepository({
    client,
    logger: deps.logger?.child({ module: "reporting/odoo_repository" }),
  });
}

export async function exportReports(
  format: ReportFormat,
  deps: ExportDependencies = {}
): Promise<ExportOutcome> {
  const logger = deps.logger ?? getLogger("reporting/export_reports");
  try {
    const source = deps.source ?? createSubscriptionSource(deps);
    logger.info({ format }, "Starting report generation");
    const reports = await generateSubscriptionReports({ source, logger });

    if (format === "json") {
      return { ok: true, format, payload: reports };
    }

    if (reports.length === 0) {
      throw new EmptyReportError();
    }
    const fileContent = await renderWorkbookBase64(reports);
    return { ok: true, format, payload: { fileContent } };
  } catch (err) {
    if (err instanceof ConfigurationError || err instanceof EmptyReportError) {
      logger.error({ missing: missingVars(err) }, err.message);
      return { ok: false, status: 400, error: err.message };
    }
    logger.error({ err }, `An unexpected error occurred: ${errorMessage(err)}`);
    return {
      ok: false,
      status: 500,
      error: `An unexpected error occurred: ${errorMessage(err)}`,
    };
  }
}

function missingVars(err: Error): string[] | undefined {
  return err instanceof ConfigurationError ? err.missing : undefined;
}
