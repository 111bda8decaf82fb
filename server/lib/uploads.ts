import fs from "node:fs/promises";
import path from "node:path";
import { ValidationError } from "../utils/http-error";
import { getConfig } from "./config";

const DATA_URL = /^data:(image\/png|image\/jpeg|image\/webp|application\/pdf);base64,([A-Za-z0-9+/=\s]+)$/;

const EXTENSIONS: Record<string, string> = {
  "image/png": "png",
  "image/jpeg": "jpg",
  "image/webp": "webp",
  "application/pdf": "pdf",
};

export const MAX_UPLOAD_BYTES = 8 * 1024 * 1024;

/**
 * Writes a base64 data URL under `<uploadDir>/<folder>` and returns the
 * public path it is served from.
 */
export async function saveDataUrl(
  dataUrl: string,
  folder: string,
  baseName: string,
): Promise<string> {
  const match = DATA_URL.exec(dataUrl.trim());
  if (!match) {
    throw new ValidationError("Unsupported file: expected a PNG, JPEG, WEBP or PDF data URL");
  }
  const [, mime, payload] = match;
  const bytes = Buffer.from(payload.replace(/\s/g, ""), "base64");
  if (bytes.length === 0) throw new ValidationError("Empty file");
  if (bytes.length > MAX_UPLOAD_BYTES) throw new ValidationError("File too large");

  const safeBase = baseName.replace(/[^A-Za-z0-9_-]/g, "_");
  const fileName = `${safeBase}-${Date.now()}.${EXTENSIONS[mime] ?? "bin"}`;
  const dir = path.join(getConfig().uploadDir, folder);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(path.join(dir, fileName), bytes);
  return `/uploads/${folder}/${fileName}`;
}

/** Empties the upload directory, keeping the directory itself. */
export async function clearUploads(): Promise<void> {
  const dir = getConfig().uploadDir;
  await fs.mkdir(dir, { recursive: true });
  const entries = await fs.readdir(dir);
  await Promise.all(
    entries.map((entry) => fs.rm(path.join(dir, entry), { recursive: true, force: true })),
  );
}
