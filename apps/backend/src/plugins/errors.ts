import fp from "fastify-plugin";
import { ZodError } from "zod";
import { ResearchEngineError, type ErrorCode } from "core";

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  session_not_found: 404,
  privacy_violation: 403,
  configuration_error: 500,
  research_error: 400,
};

export interface ErrorReply {
  status: number;
  code: string;
  message: string;
}

/**
 * Map any thrown value onto an HTTP status and a stable error code
 */
export function toErrorReply(error: unknown): ErrorReply {
  if (error instanceof ZodError) {
    return {
      status: 400,
      code: "validation_error",
      message: error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; "),
    };
  }
  if (error instanceof ResearchEngineError) {
    return { status: STATUS_BY_CODE[error.code] ?? 500, code: error.code, message: error.message };
  }
  if (
    error instanceof Error &&
    "statusCode" in error &&
    typeof error.statusCode === "number" &&
    error.statusCode < 500
  ) {
    return { status: error.statusCode, code: "bad_request", message: error.message };
  }
  return {
    status: 500,
    code: "internal_error",
    message: error instanceof Error ? error.message : String(error),
  };
}

// Uniform error shape for every route: { error: { code, message, detail? } }
export default fp(async (app) => {
  app.setErrorHandler((error, req, rep) => {
    const reply = toErrorReply(error);
    if (reply.status >= 500) {
      req.log.error({ err: error }, "request failed");
    } else {
      req.log.info({ code: reply.code }, reply.message);
    }
    const isDev = process.env.NODE_ENV !== "production";
    return rep.status(reply.status).send({
      error: {
        code: reply.code,
        message: reply.status >= 500 && !isDev ? "Internal server error" : reply.message,
      },
    });
  });
});
