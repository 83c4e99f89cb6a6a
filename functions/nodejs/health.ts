// Handler for the health check.
//
// Endpoint: GET /
import { json, type HttpResponse } from "./http";

export const handler = async (): Promise<HttpResponse> =>
  json(200, {
    status: "Backend is running",
    message: "Subscription Reporter API",
  });
