// Handler for the normalized subscription reports as JSON.
// Thin wrapper delegating to the reporting export use case.
//
// Endpoint: GET /api/reports
// Responses:
//   - 200: Report[]
//   - 400: { error } when the backend connection is not configured
//   - 500: { error } on anything unexpected
import {
  exportReports,
  type ExportDependencies,
} from "../../src/reporting/business/export_reports";
import { json, type HttpResponse } from "./http";

export const handler = async (
  deps: ExportDependencies = {}
): Promise<HttpResponse> => {
  const outcome = await exportReports("json", deps);
  if (!outcome.ok) {
    return json(outcome.status, { error: outcome.error });
  }
  return json(200, outcome.payload);
};
