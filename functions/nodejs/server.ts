// HTTP entrypoint: mounts the report handlers on an express app.
import "dotenv/config";
import cors from "cors";
import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import { getLogger } from "../../src/util/logger";
import { getNumber } from "../../src/util/env";
import { errorMessage } from "../../src/util/errors";
import type { ExportDependencies } from "../../src/reporting/business/export_reports";
import { handler as health } from "./health";
import { handler as getReports } from "./get_reports";
import { handler as getExcelReport } from "./get_excel_report";
import type { HttpResponse } from "./http";

const logger = getLogger("server");

function send(res: Response, result: HttpResponse): void {
  res.status(result.statusCode).set(result.headers).send(result.body);
}

export interface AppHandlers {
  health: () => Promise<HttpResponse>;
  getReports: (deps: ExportDependencies) => Promise<HttpResponse>;
  getExcelReport: (deps: ExportDependencies) => Promise<HttpResponse>;
}

export interface AppOptions {
  /** Passed to every report handler; the request logger is added per route. */
  deps?: ExportDependencies;
  handlers?: Partial<AppHandlers>;
}

export function createApp(options: AppOptions = {}): Express {
  const deps = options.deps ?? {};
  const handlers: AppHandlers = {
    health,
    getReports,
    getExcelReport,
    ...options.handlers,
  };
  const app = express();
  app.use(cors());

  app.use((req, _res, next) => {
    logger.debug({ method: req.method, url: req.url }, "request");
    next();
  });

  app.get("/", async (_req, res, next) => {
    try {
      send(res, await handlers.health());
    } catch (err) {
      next(err);
    }
  });

  // Each request builds its own client from the environment; the request
  // logger is handed down so every line carries the route.
  app.get("/api/reports", async (req, res, next) => {
    try {
      send(
        res,
        await handlers.getReports({
          ...deps,
          logger: (deps.logger ?? logger).child({ route: req.path }),
        })
      );
    } catch (err) {
      next(err);
    }
  });

  app.get("/api/reports/excel", async (req, res, next) => {
    try {
      send(
        res,
        await handlers.getExcelReport({
          ...deps,
          logger: (deps.logger ?? logger).child({ route: req.path }),
        })
      );
    } catch (err) {
      next(err);
    }
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err }, "Unhandled route error");
    res
      .status(500)
      .json({ error: `An unexpected error occurred: ${errorMessage(err)}` });
  });

  return app;
}

if (require.main === module) {
  const port = getNumber("PORT", 3000) ?? 3000;
  const server = createApp().listen(port, () => {
    logger.info({ port }, `Backend listening on port ${port}`);
  });

  server.on("error", err => {
    logger.fatal({ err }, "Server error during listen");
    process.exit(1);
  });
}
