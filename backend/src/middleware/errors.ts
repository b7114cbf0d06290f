import type { ErrorRequestHandler } from "express";
import type { Logger } from "pino";
import { isSaleDeskError, type SaleDeskErrorCode } from "../../../sdk/core/src";

const STATUS_BY_CODE: Record<SaleDeskErrorCode, number> = {
  VALIDATION: 400,
  AUTHORIZATION: 403,
  NOT_FOUND: 404,
  STATE: 409,
  CAPACITY_EXCEEDED: 409,
  INSUFFICIENT_ALLOWANCE: 409,
  REENTRANCY: 409,
  ORACLE: 503,
  TRANSFER_FAILURE: 502,
};

export function statusFor(code: SaleDeskErrorCode): number {
  return STATUS_BY_CODE[code];
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (isSaleDeskError(err)) {
      logger.debug({ code: err.code, path: req.path }, err.message);
      res.status(statusFor(err.code)).json({ error: err.message, code: err.code });
      return;
    }
    // Malformed JSON body from express.json()
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body", code: "VALIDATION" });
      return;
    }
    logger.error({ err, method: req.method, path: req.path }, "Unhandled error");
    res.status(500).json({ error: "Internal server error", code: "INTERNAL" });
  };
}
