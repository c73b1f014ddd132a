import type { FastifyInstance, FastifyError } from "fastify";
import fp from "fastify-plugin";
import { ZodError } from "zod";
import { TemplateError } from "@support-rag/shared";

// ─── Application error ──────────────────────────────────────────────

export class AppError extends Error {
  public readonly statusCode: number;
  constructor(message: string, statusCode: number) {
    super(message);
    this.name = "AppError";
    this.statusCode = statusCode;
  }
}

export function badRequest(message: string): AppError {
  return new AppError(message, 400);
}

function isFastifyError(error: Error): error is FastifyError {
  return "code" in error && "statusCode" in error;
}

// ─── Error handler plugin ───────────────────────────────────────────

async function errorHandler(app: FastifyInstance) {
  app.setErrorHandler((error: FastifyError | Error, request, reply) => {
    // Zod validation errors → 400
    if (error instanceof ZodError) {
      reply.status(400).send({
        error: "Validation Error",
        details: error.errors.map((e) => ({
          path: e.path.join("."),
          message: e.message,
        })),
      });
      return;
    }

    // Application errors → statusCode
    if (error instanceof AppError) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }

    // A prompt that cannot be rendered is a server-side misconfiguration
    if (error instanceof TemplateError) {
      request.log.error({ err: error, code: error.code }, "Prompt template failed to render");
      reply.status(500).send({ error: "Internal Server Error" });
      return;
    }

    // Fastify validation errors (schema)
    if ("validation" in error && error.validation) {
      reply.status(400).send({
        error: "Validation Error",
        details: error.validation,
      });
      return;
    }

    // Unexpected errors
    const status = isFastifyError(error) ? error.statusCode ?? 500 : 500;
    if (status >= 500) {
      request.log.error({ err: error }, "Request failed");
    }
    reply.status(status).send({
      error: status >= 500 ? "Internal Server Error" : error.message,
    });
  });
}

export const errorHandlerPlugin = fp(errorHandler, {
  name: "error-handler",
});
