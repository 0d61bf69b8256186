// src/core/launcher/banner.ts

import { resolveDatabaseUrl, resolveEnvironment, type EnvSource } from "../config/env";
import { SERVICE_NAME } from "../service";

/** Lines printed before the server starts. Raw env values, no validation. */
export function startupBanner(env: EnvSource): string[] {
  return [
    `Starting ${SERVICE_NAME}...`,
    `Environment: ${resolveEnvironment(env)}`,
    `Database URL: ${resolveDatabaseUrl(env)}`,
  ];
}
