import type { Response, NextFunction, Request } from "express";
import { parseStringParam } from "../utils/query-parser";
import { RESPONSES } from "../utils/question-constants";

/** Shape attached to requests after the token check */
export interface CustomRequest extends Request {
  authorized?: boolean;
}

/**
 * Exact comparison against the configured secret.
 * With no secret configured nothing is authorized.
 */
export function isAuthorized(
  expected: string | undefined,
  given: string | undefined
): boolean {
  return expected !== undefined && given === expected;
}

/**
 * Resolve `?token=` for every request on the router.
 * A missing or wrong token is not an error here, just an anonymous caller.
 */
export function resolveAccess(token: string | undefined) {
  return (req: CustomRequest, _res: Response, next: NextFunction) => {
    req.authorized = isAuthorized(token, parseStringParam(req.query.token));
    next();
  };
}

/** Gate for write routes: 403 "Unauthorized" unless the token matched */
export function requireToken(
  req: CustomRequest,
  res: Response,
  next: NextFunction
) {
  if (req.authorized) return next();

  console.log(`[questions] unauthorized ${req.method} ${req.baseUrl}`);
  res.status(403).type("application/json").send(RESPONSES.unauthorized);
}
