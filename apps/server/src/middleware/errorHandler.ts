import type { Request, Response, NextFunction } from "express";
import { HttpError } from "../lib/httpError";
import { logger } from "../lib/logger";

function statusOf(err: unknown): number {
  if (err instanceof HttpError) return err.statusCode;
  if (typeof err === "object" && err !== null) {
    const s = "statusCode" in err ? err.statusCode : "status" in err ? err.status : undefined;
    if (typeof s === "number" && s >= 400 && s < 600) return s;
  }
  return 500;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const status = statusOf(err);
  const problem = {
    type: "about:blank",
    title: status >= 500 ? "Interner Fehler" : "Fehlerhafte Anfrage",
    status,
    detail: status >= 500 ? "Unbekannter Fehler" : err instanceof Error ? err.message : "Unbekannter Fehler",
    instance: req.originalUrl,
  };
  if (status >= 500) logger.error({ rid: req.rid, err }, "error");
  else logger.warn({ rid: req.rid, err }, "bad request");
  res.status(status).type("application/problem+json").send(JSON.stringify(problem));
}

export function notFound(req: Request, res: Response) {
  res
    .status(404)
    .type("application/problem+json")
    .send(
      JSON.stringify({
        type: "about:blank",
        title: "Nicht gefunden",
        status: 404,
        instance: req.originalUrl,
      })
    );
}
