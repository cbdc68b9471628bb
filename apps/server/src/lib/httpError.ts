// src/lib/httpError.ts
export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "HttpError";
  }
}

/** Nicht auswertbarer Querystring (wird zu 400). */
export class QueryError extends HttpError {
  constructor(
    public readonly key: string,
    message: string
  ) {
    super(400, message, { key });
    this.name = "QueryError";
  }
}
