import path from "node:path";
import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const environmentSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8080),

  MYSQL_HOST: optionalString,
  MYSQL_PORT: z.coerce.number().int().positive().default(3306),
  MYSQL_DATABASE: optionalString,
  MYSQL_USER: optionalString,
  MYSQL_PASSWORD: optionalString,

  LOCAL_DB_PATH: optionalString,
  LOCAL_DB_DIR: optionalString,
  PORTABLE_EXECUTABLE_DIR: optionalString,

  UPLOAD_DIR: optionalString,
  SEED_ADMIN_PASSWORD: z.string().min(1).default("admin"),
  APP_BRAND: z.string().min(1).default("Pawn Ledger"),
  // Base of the links in recovery mail.
  PUBLIC_URL: optionalString.pipe(z.string().url().optional()),
});

export type Environment = z.infer<typeof environmentSchema>;

export interface AppConfig extends Environment {
  uploadDir: string;
  publicUrl: string;
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (cached) return cached;
  const parsed = environmentSchema.safeParse(process.env);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("[config] invalid environment", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }
  cached = {
    ...parsed.data,
    uploadDir: path.resolve(parsed.data.UPLOAD_DIR ?? path.join(process.cwd(), "uploads")),
    publicUrl: (parsed.data.PUBLIC_URL ?? `http://localhost:${parsed.data.PORT}`).replace(/\/+$/, ""),
  };
  return cached;
}
