// src/index.ts
// Process entry: banner, then web server on HOST:PORT (default 0.0.0.0:8000).

import { loadDotenv } from "./core/config/env";
import { defaultLauncherDeps, launch } from "./core/launcher/launcher";
import { logger } from "./core/logging/logger";

loadDotenv();

launch(process.argv.slice(2), process.env, defaultLauncherDeps)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error({ error: String(err) }, "launcher_failed");
    process.exitCode = 1;
  });
