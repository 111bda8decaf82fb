import type { RowDataPacket } from "mysql2/promise";
import { z } from "zod";
import type { ShopSettings } from "@shared/pawn";
import { getInitializedPool } from "../lib/mysql";
import { ValidationError } from "../utils/http-error";

interface SettingRow extends RowDataPacket {
  name: string;
  value: string;
}

const SETTING_KEYS: ReadonlyArray<[keyof ShopSettings, string]> = [
  ["defaultInterestRate", "default_interest_rate"],
  ["defaultTermDays", "default_term_days"],
  ["renewDays", "renew_days"],
  ["recoveryEmail", "recovery_email"],
  ["smtpHost", "smtp_host"],
  ["smtpPort", "smtp_port"],
  ["smtpUser", "smtp_user"],
  ["smtpPass", "smtp_pass"],
];

// Stored values that fail to parse fall back to the default.
const storedSettingsSchema = z.object({
  defaultInterestRate: z.coerce.number().positive().catch(20),
  defaultTermDays: z.coerce.number().int().positive().catch(90),
  renewDays: z.coerce.number().int().min(0).catch(30),
  recoveryEmail: z.string().trim().catch(""),
  smtpHost: z.string().trim().catch(""),
  smtpPort: z.coerce.number().int().positive().catch(587),
  smtpUser: z.string().trim().catch(""),
  smtpPass: z.string().catch(""),
});

const settingsPatchSchema = z
  .object({
    defaultInterestRate: z.coerce.number().positive().max(100),
    defaultTermDays: z.coerce.number().int().positive().max(3650),
    renewDays: z.coerce.number().int().min(0).max(3650),
    recoveryEmail: z.union([z.string().trim().email(), z.literal("")]),
    smtpHost: z.string().trim(),
    smtpPort: z.coerce.number().int().positive().max(65535),
    smtpUser: z.string().trim(),
    smtpPass: z.string(),
  })
  .partial()
  .strip();

export type SettingsPatch = z.infer<typeof settingsPatchSchema>;

let cached: ShopSettings | null = null;

export function invalidateSettingsCache() {
  cached = null;
}

export async function getSettings(): Promise<ShopSettings> {
  if (cached) return cached;
  const db = await getInitializedPool();
  const rows = await db.select<SettingRow>(`SELECT name, value FROM settings`);
  const byName = new Map(rows.map((row) => [row.name, row.value]));
  const raw: Record<string, string | undefined> = {};
  for (const [field, key] of SETTING_KEYS) {
    raw[field] = byName.get(key);
  }
  cached = storedSettingsSchema.parse(raw);
  return cached;
}

export function parseSettingsPatch(input: unknown): SettingsPatch {
  const parsed = settingsPatchSchema.safeParse(input);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = issue?.path.join(".") || "settings";
    throw new ValidationError(`Invalid ${field}: ${issue?.message ?? "invalid value"}`);
  }
  return parsed.data;
}

export async function updateSettings(input: unknown): Promise<ShopSettings> {
  const patch = parseSettingsPatch(input);
  const db = await getInitializedPool();
  const upsert =
    db.dialect === "mysql"
      ? `INSERT INTO settings (name, value) VALUES (?, ?)
         ON DUPLICATE KEY UPDATE value = VALUES(value)`
      : `INSERT INTO settings (name, value) VALUES (?, ?)
         ON CONFLICT(name) DO UPDATE SET value = excluded.value`;

  for (const [field, key] of SETTING_KEYS) {
    const value = patch[field];
    if (value === undefined) continue;
    await db.execute(upsert, [key, String(value)]);
  }
  invalidateSettingsCache();
  return getSettings();
}
