import type { NextFunction, Request, Response } from "express";
import type { ApiErrorBody } from "@rxverify/shared-types";
import { EntityExtractionError } from "../ner_client";

// Request errors raised by express.json (body-parser), keyed by their `type`.
const CLIENT_ERROR_CODES: Record<string, string> = {
  "entity.parse.failed": "invalid_json",
  "entity.too.large": "payload_too_large",
  "encoding.unsupported": "unsupported_encoding",
  "charset.unsupported": "unsupported_charset",
  "request.aborted": "request_aborted",
};

function readClientStatus(err: Error): number | undefined {
  // Upstream statuses on extractor failures are not the caller's fault.
  if (err instanceof EntityExtractionError) return undefined;
  const status =
    "status" in err
      ? err.status
      : "statusCode" in err
        ? err.statusCode
        : undefined;
  return typeof status === "number" && status >= 400 && status < 500
    ? status
    : undefined;
}

function toClientErrorBody(err: Error): ApiErrorBody {
  const type = "type" in err && typeof err.type === "string" ? err.type : "";
  if (type === "entity.parse.failed") {
    return { code: "invalid_json", message: "Malformed JSON body" };
  }
  const exposed = "expose" in err && err.expose === true;
  return {
    code: CLIENT_ERROR_CODES[type] ?? "bad_request",
    message: exposed ? err.message : "Bad request",
  };
}

export function createErrorHandler(options: { exposeDetails: boolean }) {
  return (err: Error, req: Request, res: Response, next: NextFunction) => {
    // Delegate to Express once a response has started.
    if (res.headersSent) {
      next(err);
      return;
    }

    const clientStatus = readClientStatus(err);
    if (clientStatus !== undefined) {
      res.status(clientStatus).json(toClientErrorBody(err));
      return;
    }

    console.error(`[api] ${req.method} ${req.path} failed:`, err);

    const isExtractorError = err instanceof EntityExtractionError;
    const body: ApiErrorBody = {
      code: isExtractorError ? "extractor_unavailable" : "server_error",
      message: options.exposeDetails
        ? err.message
        : "An unexpected error occurred",
    };
    if (options.exposeDetails && err.stack) {
      body.stack = err.stack;
    }

    res.status(isExtractorError ? 502 : 500).json(body);
  };
}
