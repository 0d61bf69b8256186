// src/core/launcher/launcher.ts

import { spawn } from "child_process";
import type { Server } from "http";
import os from "os";
import { createApp } from "../../entry/createApp";
import { loadConfig, type AppConfig, type EnvSource } from "../config/env";
import { ConfigError } from "../errors";
import { logger } from "../logging/logger";
import { startServer, stopServer } from "../server/listen";
import { startupBanner } from "./banner";

export const RELOAD_FLAG = "--reload";
export const NO_RELOAD_FLAG = "--no-reload";
/** Passed to the watched child: serve in-process, no banner, no supervision. */
export const SERVE_FLAG = "--serve";

export type LauncherDeps = {
  print: (line: string) => void;
  /** Serves the app in this process; resolves with the exit code once the server is closed. */
  serve: (config: AppConfig) => Promise<number>;
  /** Runs this entry again under `node --watch` with `args`; resolves with the child's exit code. */
  supervise: (args: string[]) => Promise<number>;
};

export type LaunchMode = "serve" | "supervise";

export function chooseMode(argv: string[], config: AppConfig): LaunchMode {
  if (argv.includes(SERVE_FLAG)) return "serve";
  if (argv.includes(NO_RELOAD_FLAG)) return "serve";
  if (argv.includes(RELOAD_FLAG)) return "supervise";
  return config.isDevelopment ? "supervise" : "serve";
}

export function exitCodeFromChild(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) {
    const signo: unknown = Object.entries(os.constants.signals).find(([name]) => name === signal)?.[1];
    if (typeof signo === "number") return 128 + signo;
  }
  return 1;
}

/**
 * Prints the startup banner, then hands off to the web server.
 * Resolves with the process exit code once the server is gone.
 */
export async function launch(argv: string[], env: EnvSource, deps: LauncherDeps): Promise<number> {
  const isChild = argv.includes(SERVE_FLAG);

  if (!isChild) {
    for (const line of startupBanner(env)) deps.print(line);
  }

  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error({ variable: err.variable, error: err.message }, "config_invalid");
      return 1;
    }
    throw err;
  }
  logger.level = config.logLevel;

  if (chooseMode(argv, config) === "supervise") {
    // node --watch wartet bei Fehlern auf Dateiänderungen statt zu beenden:
    // Port deshalb hier im Parent prüfen
    if (!(await ensureBindable(config))) return 1;
    logger.debug({ host: config.host, port: config.port }, "launcher_supervise");
    return deps.supervise([SERVE_FLAG]);
  }
  return deps.serve(config);
}

// ------------------------------------------------------------
// Default-Implementierungen (echter Prozess, echter Server)
// ------------------------------------------------------------

export function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

async function listenOrLog(config: AppConfig, handler: Parameters<typeof startServer>[0]) {
  try {
    return await startServer(handler, { host: config.host, port: config.port });
  } catch (err) {
    logger.error(
      { host: config.host, port: config.port, error: String(err) },
      "server_listen_failed"
    );
    return null;
  }
}

/** Binds and releases host:port once; false (and logged) when that fails. */
export async function ensureBindable(config: AppConfig): Promise<boolean> {
  const server = await listenOrLog(config, (_req, res) => {
    res.statusCode = 503;
    res.end();
  });
  if (!server) return false;
  await stopServer(server);
  return true;
}

/**
 * Serves the app until `untilShutdown` resolves (SIGINT/SIGTERM by default).
 * Resolves with 0 after a clean close, 1 when the address cannot be bound.
 */
export async function serveInProcess(
  config: AppConfig,
  untilShutdown: (server: Server) => Promise<string> = waitForShutdownSignal
): Promise<number> {
  const server = await listenOrLog(config, createApp(config));
  if (!server) return 1;

  logger.info(
    { host: config.host, port: config.port, environment: config.environment },
    "server_listening"
  );

  const signal = await untilShutdown(server);
  logger.info({ signal }, "server_shutdown");
  await stopServer(server);
  return 0;
}

export function superviseWithWatch(args: string[]): Promise<number> {
  const entry = process.argv[1];
  const child = spawn(process.execPath, [...process.execArgv, "--watch", entry, ...args], {
    stdio: "inherit",
    env: process.env,
  });

  const forward = (signal: NodeJS.Signals) => {
    child.kill(signal);
  };
  process.on("SIGINT", forward);
  process.on("SIGTERM", forward);

  return new Promise((resolve, reject) => {
    child.once("error", (err) => {
      process.off("SIGINT", forward);
      process.off("SIGTERM", forward);
      reject(err);
    });
    child.once("exit", (code, signal) => {
      process.off("SIGINT", forward);
      process.off("SIGTERM", forward);
      resolve(exitCodeFromChild(code, signal));
    });
  });
}

export const defaultLauncherDeps: LauncherDeps = {
  print: (line) => {
    process.stdout.write(`${line}\n`);
  },
  serve: (config) => serveInProcess(config),
  supervise: superviseWithWatch,
};
