import type { Role, UsersListResponse } from "@shared/api";
import { createUser, deleteUser, listUsers } from "../store/auth";
import { authedRoute } from "../lib/http";
import { parseBody } from "../utils/parse-body";
import { oneOf, optionalText, text } from "../utils/fields";

const ROLES: readonly Role[] = ["admin", "staff"];

export const listUsersHandler = authedRoute(
  "users",
  async (_req, res) => {
    const response: UsersListResponse = { users: await listUsers() };
    res.json(response);
  },
  { admin: true },
);

export const createUserHandler = authedRoute(
  "users",
  async (req, res) => {
    const body = parseBody(req.body);
    const user = await createUser({
      username: text(body.username),
      name: text(body.name),
      email: optionalText(body.email),
      role: oneOf(body.role, ROLES),
      password: typeof body.password === "string" ? body.password : "",
    });
    res.status(201).json(user);
  },
  { admin: true },
);

export const deleteUserHandler = authedRoute(
  "users",
  async (req, res, auth) => {
    await deleteUser(req.params.id, auth.user.id);
    res.status(204).end();
  },
  { admin: true },
);
