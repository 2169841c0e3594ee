/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

export interface FileSystem {
  readFile(path: string): string;
  readFileBinary(path: string): Buffer;
  writeFile(path: string, content: string): void;
  writeFileBinary(path: string, content: Buffer): void;
  exists(path: string): boolean;
  mkdir(path: string, options?: { recursive?: boolean }): void;
  readdir(path: string): string[];
  stat(path: string): { isDirectory: boolean; isFile: boolean; size: number };
  unlink(path: string): void;
  rmdir(path: string, options?: { recursive?: boolean }): void;
  copyFile(src: string, dest: string): void;
}

export interface HttpClient {
  fetch(url: string, options?: RequestInit): Promise<Response>;
}

/**
 * Command executor using array-based arguments.
 * Arguments are passed to the executable as-is, never through a shell.
 *
 * @example shell.execFile("tar", ["-czf", "model.tar.gz", "-C", stagingDir, "."])
 */
export interface ShellExecutor {
  execFile(command: string, args: string[]): string;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

/**
 * Structured logger. Fields are merged into the emitted entry;
 * child loggers carry their bound fields on every entry.
 */
export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(fields: LogFields): Logger;
}

export interface SecretProvider {
  getSourceToken(): string | undefined;
  getWebhookSecret(): string | undefined;
}

export interface PathConfig {
  /** Scratch space for downloads and archive staging */
  workDir: string;
}

export interface EngineContext {
  fs: FileSystem;
  http: HttpClient;
  shell: ShellExecutor;
  logger: Logger;
  secrets: SecretProvider;
  paths: PathConfig;
}
