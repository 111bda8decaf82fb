export type FormBody = Record<string, unknown>;

function isRecord(value: unknown): value is FormBody {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function safeParse(value: string): FormBody {
  try {
    const parsed: unknown = JSON.parse(value);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

/** Request body as a plain object, whether express parsed it already or not. */
export function parseBody(input: unknown): FormBody {
  if (input == null) {
    return {};
  }
  if (typeof input === "string") {
    return safeParse(input);
  }
  if (Buffer.isBuffer(input)) {
    return safeParse(input.toString("utf8"));
  }
  return isRecord(input) ? input : {};
}
