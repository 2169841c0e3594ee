/**
 * Node.js bindings for the core interfaces.
 *
 * Everything else in the engine only sees the interfaces; this is the one
 * place that touches the real filesystem, network, process and environment.
 */

import { execFileSync } from "child_process";
import {
  copyFileSync,
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  rmSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from "fs";
import type {
  EngineContext,
  FileSystem,
  HttpClient,
  LogFields,
  LogLevel,
  Logger,
  SecretProvider,
  ShellExecutor,
} from "./interfaces";

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function createNodeFileSystem(): FileSystem {
  return {
    readFile: (path) => readFileSync(path, "utf-8"),
    readFileBinary: (path) => readFileSync(path),
    writeFile: (path, content) => writeFileSync(path, content, "utf-8"),
    writeFileBinary: (path, content) => writeFileSync(path, content),
    exists: (path) => existsSync(path),
    mkdir: (path, options) => {
      mkdirSync(path, { recursive: options?.recursive ?? false });
    },
    readdir: (path) => readdirSync(path),
    stat: (path) => {
      const stats = statSync(path);
      return { isDirectory: stats.isDirectory(), isFile: stats.isFile(), size: stats.size };
    },
    unlink: (path) => unlinkSync(path),
    rmdir: (path, options) => rmSync(path, { recursive: options?.recursive ?? false, force: true }),
    copyFile: (src, dest) => copyFileSync(src, dest),
  };
}

export function createNodeHttpClient(): HttpClient {
  return {
    fetch: (url, options) => fetch(url, options),
  };
}

export function createNodeShellExecutor(): ShellExecutor {
  return {
    execFile: (command, args) =>
      execFileSync(command, args, { encoding: "utf-8", maxBuffer: 64 * 1024 * 1024 }),
  };
}

/**
 * Logger writing one JSON object per line.
 * Entries below minLevel are dropped; warn and error go to stderr.
 */
export function createJsonLogger(
  minLevel: LogLevel = "info",
  bound: LogFields = {},
  write: (level: LogLevel, line: string) => void = writeLogLine
): Logger {
  const emit = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[minLevel]) return;
    const entry = {
      level,
      timestamp: new Date().toISOString(),
      message,
      ...bound,
      ...fields,
    };
    write(level, JSON.stringify(entry, serializeErrors));
  };

  return {
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
    child: (fields) => createJsonLogger(minLevel, { ...bound, ...fields }, write),
  };
}

function writeLogLine(level: LogLevel, line: string): void {
  const stream = level === "warn" || level === "error" ? process.stderr : process.stdout;
  stream.write(`${line}\n`);
}

function serializeErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

/**
 * Secrets from the environment.
 * Source token: MLFLOW_TRACKING_TOKEN, then DATABRICKS_TOKEN.
 */
export function createEnvSecretProvider(
  env: Record<string, string | undefined> = process.env,
  overrides: { sourceToken?: string; webhookSecret?: string } = {}
): SecretProvider {
  return {
    getSourceToken: () =>
      overrides.sourceToken ?? env.MLFLOW_TRACKING_TOKEN ?? env.DATABRICKS_TOKEN,
    getWebhookSecret: () => overrides.webhookSecret ?? env.WEBHOOK_SHARED_SECRET,
  };
}

export interface NodeContextOptions {
  workDir: string;
  logLevel?: LogLevel;
  secrets?: SecretProvider;
}

export function createNodeContext(options: NodeContextOptions): EngineContext {
  return {
    fs: createNodeFileSystem(),
    http: createNodeHttpClient(),
    shell: createNodeShellExecutor(),
    logger: createJsonLogger(options.logLevel),
    secrets: options.secrets ?? createEnvSecretProvider(),
    paths: { workDir: options.workDir },
  };
}
