/**
 * Shared helpers for route handlers: error mapping and request-scoped judge.
 */

import type { Request, Response } from "express";
import type { ZodError } from "zod";
import { AppError, InvalidInputError, errorMessage, type ErrorCode } from "../../src/lib/errors.js";
import { createJudge, isJudgeProvider } from "../../src/lib/judge/index.js";
import type { Judge } from "../../src/lib/judge/types.js";

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  NotFound: 404,
  InvalidInput: 400,
  TaskConfig: 422,
  Persistence: 503,
  Judge: 502,
};

export function sendError(res: Response, err: unknown): void {
  if (err instanceof AppError) {
    res.status(STATUS_BY_CODE[err.code]).json({ error: err.message, code: err.code });
    return;
  }
  console.error("[Server] Unhandled error:", errorMessage(err));
  res.status(500).json({ error: errorMessage(err) });
}

export function validationError(err: ZodError): InvalidInputError {
  const detail = err.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
  return new InvalidInputError(`Invalid request: ${detail}`);
}

/**
 * Judge from x-judge-provider / x-judge-api-key headers. undefined when the
 * request carries no key, so the server default applies.
 */
export function requestJudge(req: Request): Judge | undefined {
  const apiKey = req.get("x-judge-api-key")?.trim();
  if (!apiKey) return undefined;
  const provider = req.get("x-judge-provider")?.trim().toLowerCase() || "openrouter";
  if (!isJudgeProvider(provider)) {
    throw new InvalidInputError(`Unknown judge provider: ${provider}`);
  }
  return createJudge({ provider, apiKey }) ?? undefined;
}
