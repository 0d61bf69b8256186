// src/core/service.ts

import fs from "fs";
import path from "path";

export const SERVICE_NAME = "Personal Chat AI Backend";

// src/core und dist/core liegen beide zwei Ebenen unter package.json
const PACKAGE_JSON = path.resolve(__dirname, "..", "..", "package.json");

export function readServiceVersion(file = PACKAGE_JSON): string {
  const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "version" in parsed &&
    typeof parsed.version === "string" &&
    parsed.version.trim()
  ) {
    return parsed.version.trim();
  }
  throw new Error(`${file}: missing "version"`);
}

export const SERVICE_VERSION = readServiceVersion();
