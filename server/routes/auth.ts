import type {
  AuthLoginResponse,
  AuthMeResponse,
  PasswordRecoverResponse,
} from "@shared/api";
import {
  authenticate,
  createPasswordResets,
  getUserByTokenAsync,
  invalidateTokenAsync,
  resetPassword,
} from "../store/auth";
import { getSettings } from "../store/settings";
import { getConfig } from "../lib/config";
import { sendMail } from "../lib/mailer";
import { publicRoute, respondError, tokenFromRequest } from "../lib/http";
import { parseBody } from "../utils/parse-body";
import { text } from "../utils/fields";

export const loginHandler = publicRoute("auth", async (req, res) => {
  const body = parseBody(req.body);
  const username = text(body.username);
  const password = typeof body.password === "string" ? body.password : "";
  if (!username || !password) {
    respondError(res, 400, "Missing credentials");
    return;
  }
  const result = await authenticate(username, password);
  if (!result) {
    respondError(res, 401, "Invalid credentials or inactive user");
    return;
  }
  const response: AuthLoginResponse = result;
  res.json(response);
});

export const meHandler = publicRoute("auth", async (req, res) => {
  const user = await getUserByTokenAsync(tokenFromRequest(req));
  const response: AuthMeResponse = { user };
  res.json(response);
});

export const logoutHandler = publicRoute("auth", async (req, res) => {
  const token = tokenFromRequest(req);
  if (token) await invalidateTokenAsync(token);
  res.status(204).end();
});

/**
 * Issues a reset link for every active user and mails the batch to the
 * shop's recovery address.
 */
export const recoverHandler = publicRoute("auth", async (_req, res) => {
  const settings = await getSettings();
  const grants = await createPasswordResets();
  const base = getConfig().publicUrl;
  const lines = grants.map(
    (grant) =>
      `${grant.user.username}: ${base}/reset?token=${grant.token}&u=${encodeURIComponent(grant.user.username)} (valid until ${grant.expiresAt})`,
  );
  const sent = await sendMail(settings, {
    to: settings.recoveryEmail,
    subject: "Password recovery",
    text: ["Password reset links:", "", ...lines].join("\n"),
  });
  const response: PasswordRecoverResponse = { sent, users: grants.length };
  res.json(response);
});

export const resetHandler = publicRoute("auth", async (req, res) => {
  const body = parseBody(req.body);
  await resetPassword({
    token: text(body.token),
    username: text(body.username),
    password: typeof body.password === "string" ? body.password : "",
    password2: typeof body.password2 === "string" ? body.password2 : "",
  });
  res.status(204).end();
});
