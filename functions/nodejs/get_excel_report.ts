// Handler for the spreadsheet export.
//
// Endpoint: GET /api/reports/excel
// Responses:
//   - 200: { fileContent } with the .xlsx workbook base64-encoded
//   - 400: { error } on missing configuration or when there is no data
//   - 500: { error } on anything unexpected
import {
  exportReports,
  type ExportDependencies,
} from "../../src/reporting/business/export_reports";
import { json, type HttpResponse } from "./http";

export const handler = async (
  deps: ExportDependencies = {}
): Promise<HttpResponse> => {
  const outcome = await exportReports("excel", deps);
  if (!outcome.ok) {
    return json(outcome.status, { error: outcome.error });
  }
  return json(200, outcome.payload);
};
