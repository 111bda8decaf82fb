import type { RequestHandler } from "express";
import type { ApiError, User } from "@shared/api";
import { getUserByTokenAsync, verifyPassword } from "../store/auth";
import { ForbiddenError, HttpError } from "../utils/http-error";
import { text } from "../utils/fields";

export type Req = Parameters<RequestHandler>[0];
export type Res = Parameters<RequestHandler>[1];

export interface AuthContext {
  user: User;
  token: string;
}

export type AuthedHandler = (req: Req, res: Res, auth: AuthContext) => Promise<void>;

export function respondError(res: Res, status: number, message: string, code?: string) {
  const body: ApiError = code ? { error: message, code } : { error: message };
  res.status(status).json(body);
}

function getTokenFromHeader(auth?: string) {
  if (!auth) return null;
  const [type, token] = auth.split(" ");
  if (type !== "Bearer") return null;
  return token || null;
}

export function extractToken(auth?: string, queryToken?: string) {
  if (queryToken) return queryToken;
  return getTokenFromHeader(auth);
}

export function queryParam(req: Req, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

export function tokenFromRequest(req: Req) {
  return extractToken(req.headers.authorization, queryParam(req, "token"));
}

async function requireAuth(req: Req, res: Res): Promise<AuthContext | null> {
  const token = tokenFromRequest(req);
  if (!token) {
    respondError(res, 401, "Unauthorized");
    return null;
  }
  const user = await getUserByTokenAsync(token);
  if (!user || !user.active) {
    respondError(res, 401, "Unauthorized");
    return null;
  }
  return { user, token };
}

export function handleError(res: Res, error: unknown, scope: string) {
  if (error instanceof HttpError) {
    respondError(res, error.status, error.message, error.code);
    return;
  }
  // eslint-disable-next-line no-console
  console.error(`[${scope}] request failed`, error);
  respondError(res, 500, "Internal server error");
}

/** Wraps a public handler so thrown errors become JSON responses. */
export function publicRoute(
  scope: string,
  handler: (req: Req, res: Res) => Promise<void>,
): RequestHandler {
  return async (req, res) => {
    try {
      await handler(req, res);
    } catch (error) {
      handleError(res, error, scope);
    }
  };
}

/** Resolves the session first; `admin` additionally requires the admin role. */
export function authedRoute(
  scope: string,
  handler: AuthedHandler,
  options: { admin?: boolean } = {},
): RequestHandler {
  return async (req, res) => {
    try {
      const auth = await requireAuth(req, res);
      if (!auth) return;
      if (options.admin && auth.user.role !== "admin") {
        respondError(res, 403, "Forbidden", "FORBIDDEN");
        return;
      }
      await handler(req, res, auth);
    } catch (error) {
      handleError(res, error, scope);
    }
  };
}

/** Destructive actions ask the operator to type their own password again. */
export async function confirmPassword(auth: AuthContext, body: Record<string, unknown>) {
  const password = typeof body.password === "string" ? body.password : text(body.password);
  const ok = await verifyPassword(auth.user.id, password);
  if (!ok) throw new ForbiddenError("Invalid password", "INVALID_PASSWORD");
}
