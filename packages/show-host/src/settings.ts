import { readFile } from "node:fs/promises";
import { formatIssues, GestureSettingsSchema } from "./schemas";
import type { GestureSettings } from "./schemas";
import type { Logger } from "./types";

export const DEFAULT_SETTINGS_FILE = "gesture-settings.json";

export class SettingsError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "SettingsError";
  }
}

export function parseGestureSettings(raw: unknown): GestureSettings {
  const result = GestureSettingsSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new SettingsError("Invalid gesture settings", formatIssues(result.error));
  }
  return result.data;
}

/**
 * Read settings from a JSON file. A missing file is not an error: touring rigs
 * run on defaults until someone drops a settings file next to the host.
 */
export async function loadGestureSettings(
  path: string = DEFAULT_SETTINGS_FILE,
  logger: Logger = console
): Promise<GestureSettings> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    if (isMissingFile(err)) {
      logger.warn(`gesture-host: ${path} not found, using default settings`);
      return parseGestureSettings({});
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SettingsError(`${path} is not valid JSON`, [err instanceof Error ? err.message : String(err)]);
  }
  return parseGestureSettings(raw);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
