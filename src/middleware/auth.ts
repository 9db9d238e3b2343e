import { NextFunction, Request, RequestHandler, Response } from "express";
import { Principal } from "../ledger/types";
import { UnauthorizedError } from "../utils/errors";

export const PRINCIPAL_HEADER = "x-principal";

export const apiKeyMiddleware =
  (apiKey: string): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    if (req.header("x-api-key") === apiKey) {
      next();
    } else {
      next(new UnauthorizedError("Invalid or missing API key", 401));
    }
  };

/**
 * The caller identity, authenticated upstream and forwarded in the
 * x-principal header. Mutating routes refuse to run without it.
 */
export const callerOf = (req: Request): Principal => {
  const principal = req.header(PRINCIPAL_HEADER)?.trim();
  if (!principal) {
    throw new UnauthorizedError(`Missing ${PRINCIPAL_HEADER} header`, 401);
  }
  return principal;
};
