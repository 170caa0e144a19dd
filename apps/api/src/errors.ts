import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import type { ZodIssue } from "zod";
import { createApiError } from "@pantry/shared";
import { PersistenceFailureError, isQuoteEngineError, type ErrorCategory } from "@pantry/quote-engine";

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  not_found: 404,
  precondition_failed: 409,
  validation_failed: 400,
  internal: 500,
};

/** Request body or params failed schema validation. */
export class RequestValidationError extends Error {
  constructor(readonly issues: ZodIssue[]) {
    super(issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; "));
    this.name = "RequestValidationError";
  }
}

export function errorHandler(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) {
  if (error instanceof RequestValidationError) {
    return reply.status(400).send(createApiError("VALIDATION_FAILED", error.message, error.issues));
  }

  if (isQuoteEngineError(error)) {
    const status = STATUS_BY_CATEGORY[error.category];
    const details = error instanceof PersistenceFailureError ? { ...error.details, order: error.order } : error.details;
    if (status >= 500) {
      request.log.error({ err: error }, "request failed");
    }
    return reply.status(status).send(createApiError(error.code, error.message, details));
  }

  // Fastify's own client errors, e.g. malformed JSON
  if ("statusCode" in error && typeof error.statusCode === "number" && error.statusCode < 500) {
    return reply.status(error.statusCode).send(createApiError("BAD_REQUEST", error.message));
  }

  request.log.error({ err: error }, "unhandled error");
  return reply.status(500).send(createApiError("INTERNAL_ERROR", "Internal server error"));
}
