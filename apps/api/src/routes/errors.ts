import type { FastifyError, FastifyInstance } from "fastify";
import { ZodError } from "zod";
import { createApiError } from "@postroom/shared";
import {
  GenerationError,
  InvalidTransitionError,
  LifecycleError,
  NotFoundError,
} from "@postroom/lifecycle";

/** HTTP status for a lifecycle error. */
export function statusForError(error: LifecycleError): number {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof InvalidTransitionError) return 409;
  if (error instanceof GenerationError) return 502;
  return 500;
}

/** Extra fields a client needs to act on the failure (e.g. retry a partial draft). */
export function errorDetails(error: LifecycleError): Record<string, unknown> | undefined {
  if (error instanceof InvalidTransitionError) {
    return { draftId: error.draftId, from: error.from, event: error.event };
  }
  if (error instanceof GenerationError) {
    return { kind: error.kind, attempts: error.attempts, draftId: error.draftId };
  }
  if (error instanceof NotFoundError) {
    return { draftId: error.draftId };
  }
  return undefined;
}

export function registerErrorHandler(app: FastifyInstance) {
  app.setErrorHandler((error: FastifyError | Error, request, reply) => {
    if (error instanceof ZodError) {
      return reply
        .status(400)
        .send(createApiError("INVALID_REQUEST", "Request validation failed", error.issues));
    }

    if (error instanceof LifecycleError) {
      const status = statusForError(error);
      if (status >= 500) {
        request.log.error({ err: error }, error.message);
      }
      return reply
        .status(status)
        .send(createApiError(error.code, error.message, errorDetails(error)));
    }

    const statusCode = "statusCode" in error && typeof error.statusCode === "number"
      ? error.statusCode
      : 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "Unhandled error");
    }
    return reply
      .status(statusCode)
      .send(createApiError("INTERNAL", statusCode >= 500 ? "Internal server error" : error.message));
  });
}
