import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { ZodError } from "zod";
import { isPricingError } from "@greeks-surface/bs-core";
import { createLogger } from "../utils/logger";

const log = createLogger("api");

export interface ErrorBody {
  error: string;
  message: string;
  issues?: { path: string; message: string }[];
}

export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: "VALIDATION",
        message: "request validation failed",
        issues: err.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      },
    };
  }
  if (isPricingError(err)) {
    return { status: 400, body: { error: err.code, message: err.message } };
  }
  return { status: 500, body: { error: "INTERNAL", message: "internal error" } };
}

export function errorHandler(err: FastifyError, req: FastifyRequest, reply: FastifyReply) {
  // malformed JSON and the like, raised by fastify before our handlers run
  if (err.statusCode && err.statusCode < 500 && !(err instanceof ZodError)) {
    return reply.code(err.statusCode).send({ error: err.code ?? "BAD_REQUEST", message: err.message });
  }
  const { status, body } = toErrorResponse(err);
  if (status >= 500) {
    log.error(`${req.method} ${req.url} failed:`, err);
  }
  return reply.code(status).send(body);
}
