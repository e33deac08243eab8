/**
 * loadSettings — read and validate channelgate.json.
 *
 * Misconfiguration is fatal at startup, so this throws with a message
 * meant for the operator.
 */

import { readFile } from "node:fs/promises";
import { ZodError } from "zod";
import { parseSettings } from "./schema.js";
import type { Settings } from "./types.js";
import { errorMessage } from "./result.js";

export const SETTINGS_FILE = "channelgate.json";

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export async function loadSettings(path: string): Promise<Settings> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch {
    throw new Error(`No ${SETTINGS_FILE} found at ${path}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new Error(`${path} is not valid JSON: ${errorMessage(e)}`);
  }

  try {
    return parseSettings(json);
  } catch (e) {
    if (e instanceof ZodError) throw new Error(`Invalid ${path}: ${describeZodError(e)}`);
    throw e;
  }
}
