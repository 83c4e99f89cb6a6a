/**
 * Spreadsheet export for subscription reports.
 *
 * One row per product line, with every report-level column repeated. A report
 * without products still gets a single row with placeholder product columns.
 */
import * as ExcelJS from "exceljs";
import { NA, type Report } from "../reporting/types/domain";

export const SHEET_TITLE = "Subscription Report";

export const REPORT_COLUMNS = [
  "Name",
  "Status",
  "Plan",
  "Start Date",
  "End Date",
  "Customer Name",
  "Customer Address",
  "Customer Phone",
  "Delivery Name",
  "Delivery Status",
  "Delivery Date",
  "Product",
  "Quantity",
  "Unit Price",
  "Subtotal",
  "Payment Terms",
  "Untaxed Amount",
  "Total Amount",
] as const;

const COLUMN_WIDTHS = [
  16, 12, 20, 12, 14, 24, 40, 18, 16, 16, 14, 32, 10, 12, 12, 20, 16, 14,
];

export type ReportRow = Array<string | number>;

export function flattenReports(reports: Report[]): ReportRow[] {
  const rows: ReportRow[] = [];
  for (const report of reports) {
    const products =
      report.products.length > 0
        ? report.products
        : [{ name: NA, quantity: 0, unit_price: 0, subtotal: 0 }];
    for (const product of products) {
      rows.push([
        report.name,
        report.status,
        report.plan,
        report.start_date,
        report.end_date,
        report.customer.name,
        report.customer.address,
        report.customer.phone,
        report.delivery.name,
        report.delivery.status,
        report.delivery.date,
        product.name,
        product.quantity,
        product.unit_price,
        product.subtotal,
        report.payment_terms,
        report.untaxed_amount,
        report.total_amount,
      ]);
    }
  }
  return rows;
}

export async function renderWorkbook(reports: Report[]): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const ws = workbook.addWorksheet(SHEET_TITLE, {
    views: [{ state: "frozen", ySplit: 1 }],
  });

  const headerRow = ws.addRow([...REPORT_COLUMNS]);
  headerRow.font = { bold: true };
  COLUMN_WIDTHS.forEach((width, idx) => {
    ws.getColumn(idx + 1).width = width;
  });

  for (const row of flattenReports(reports)) {
    ws.addRow(row);
  }

  return Buffer.from(await workbook.xlsx.writeBuffer());
}

export async function renderWorkbookBase64(reports: Report[]): Promise<string> {
  const buffer = await renderWorkbook(reports);
  return buffer.toString("base64");
}
