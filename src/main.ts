// src/main.ts
// Entry module: exports the application object the launcher serves.

import { loadConfig, loadDotenv } from "./core/config/env";
import { createApp } from "./entry/createApp";

loadDotenv();

export const config = loadConfig(process.env);
export const app = createApp(config);
