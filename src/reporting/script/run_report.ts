#!/usr/bin/env node
/* eslint-disable no-console */
// Prints subscription reports as JSON on stdout.
//   tsx src/reporting/script/run_report.ts --format json|excel
// Errors are printed as {"error": ...}; the exit code stays 0.
import "dotenv/config";
import {
  exportReports,
  ReportFormatSchema,
  type ExportDependencies,
  type ReportFormat,
} from "../business/export_reports";

export type ParsedArgs =
  | { ok: true; format: ReportFormat }
  | { ok: false; error: string };

export function parseArgs(argv: string[]): ParsedArgs {
  let raw: string | undefined = "json";
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--format") {
      raw = argv[++i];
    } else if (arg.startsWith("--format=")) {
      raw = arg.slice("--format=".length);
    }
  }

  const parsed = ReportFormatSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      error: `Invalid format: ${raw ?? "(missing)"}. Expected one of: ${ReportFormatSchema.options.join(", ")}`,
    };
  }
  return { ok: true, format: parsed.data };
}

export async function runReport(
  argv: string[],
  deps: ExportDependencies = {}
): Promise<string> {
  const args = parseArgs(argv);
  if (!args.ok) return JSON.stringify({ error: args.error });

  const outcome = await exportReports(args.format, deps);
  if (!outcome.ok) return JSON.stringify({ error: outcome.error });
  return JSON.stringify(outcome.payload);
}

async function main() {
  console.log(await runReport(process.argv.slice(2)));
}

if (require.main === module) {
  main().catch(err => {
    console.log(
      JSON.stringify({
        error: `An unexpected error occurred: ${err instanceof Error ? err.message : String(err)}`,
      })
    );
  });
}
