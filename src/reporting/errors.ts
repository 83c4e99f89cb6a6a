/**
 * Raised when a spreadsheet is requested but there is nothing to put in it.
 */
export class EmptyReportError extends Error {
  constructor(message = "No data available to generate Excel report.") {
    super(message);
    this.name = "EmptyReportError";
  }
}
