import { type NextFunction, type Request, type Response } from "express";
import { ZodError } from "zod";
import { HttpError } from "../utils/httpError";
import { DelegatedScorerUnavailableError, PersistenceError } from "../services/evaluation/errors";
import { UnknownPersonaError } from "../services/personas";

export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new HttpError(404, "Route not found"));
}

const BODY_ERROR_MESSAGES: Record<string, string> = {
  "entity.parse.failed": "Malformed JSON body",
  "entity.too.large": "Request body too large"
};

/** express.json() rejects unreadable bodies with a 4xx `status` and a `type` tag. */
function bodyParserError(error: unknown): { status: number; message: string } | null {
  if (typeof error !== "object" || error === null || !("status" in error)) return null;
  const status = error.status;
  if (typeof status !== "number" || status < 400 || status >= 500) return null;
  const type = "type" in error && typeof error.type === "string" ? error.type : "";
  const fallback = error instanceof Error ? error.message : "Bad request";
  return { status, message: BODY_ERROR_MESSAGES[type] ?? fallback };
}

export function errorHandler(
  error: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (error instanceof HttpError) {
    res.status(error.statusCode).json({ error: error.message });
    return;
  }

  if (error instanceof ZodError) {
    res.status(400).json({ error: error.issues.map((i) => i.message).join(", ") });
    return;
  }

  if (error instanceof DelegatedScorerUnavailableError || error instanceof UnknownPersonaError) {
    res.status(400).json({ error: error.message });
    return;
  }

  const bodyError = bodyParserError(error);
  if (bodyError) {
    res.status(bodyError.status).json({ error: bodyError.message });
    return;
  }

  if (error instanceof PersistenceError) {
    console.error(`[store] ${error.message}`, error.cause);
  } else {
    console.error(error);
  }
  res.status(500).json({ error: "Internal server error" });
}
