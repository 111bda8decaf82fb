import { afterAll, describe, expect, it } from "vitest";
import { closeDatabase } from "../../lib/mysql";
import {
  authenticate,
  createPasswordResets,
  createUser,
  getUserByTokenAsync,
  resetPassword,
  verifyPassword,
} from "../auth";

describe("auth store", () => {
  afterAll(async () => {
    await closeDatabase();
  });

  it("seeds an admin that can sign in", async () => {
    const session = await authenticate("admin", "test-secret");
    expect(session?.user).toMatchObject({ username: "admin", role: "admin", active: true });
    expect(await getUserByTokenAsync(session?.token)).toEqual(session?.user);
  });

  it("checks a user's own password", async () => {
    const user = await createUser({ username: "teller", name: "Teller", password: "teller-secret" });
    expect(await verifyPassword(user.id, "teller-secret")).toBe(true);
    expect(await verifyPassword(user.id, "nope")).toBe(false);
    expect(await verifyPassword(user.id, "")).toBe(false);
  });

  it("resets a password with a fresh token and drops old sessions", async () => {
    await createUser({ username: "night", name: "Night Shift", password: "old-secret" });
    const session = await authenticate("night", "old-secret");
    const now = new Date(2024, 4, 1, 9, 0, 0);
    const grants = await createPasswordResets(now);
    const grant = grants.find((entry) => entry.user.username === "night");
    expect(grant?.expiresAt).toBe("2024-05-01 10:00:00");

    await resetPassword(
      { token: grant?.token ?? "", username: "night", password: "new-secret", password2: "new-secret" },
      new Date(2024, 4, 1, 9, 30, 0),
    );
    expect(await authenticate("night", "old-secret")).toBeNull();
    expect(await authenticate("night", "new-secret")).not.toBeNull();
    expect(await getUserByTokenAsync(session?.token)).toBeNull();

    await expect(
      resetPassword(
        { token: grant?.token ?? "", username: "night", password: "x", password2: "x" },
        new Date(2024, 4, 1, 9, 40, 0),
      ),
    ).rejects.toMatchObject({ code: "INVALID_TOKEN" });
  });

  it("refuses an expired token", async () => {
    const [grant] = await createPasswordResets(new Date(2024, 4, 1, 9, 0, 0));
    await expect(
      resetPassword(
        { token: grant.token, username: grant.user.username, password: "x", password2: "x" },
        new Date(2024, 4, 1, 10, 0, 1),
      ),
    ).rejects.toMatchObject({ status: 400, code: "TOKEN_EXPIRED" });
  });
});
