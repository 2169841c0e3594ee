/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import type {
  EngineContext,
  FileSystem,
  HttpClient,
  LogFields,
  LogLevel,
  Logger,
  SecretProvider,
  ShellExecutor,
} from "#/core";

interface MockFileEntry {
  content: string | Buffer;
  isDirectory: boolean;
}

/**
 * Create a mock FileSystem with in-memory storage
 */
export function createMockFileSystem(
  initialFiles: Record<string, string | Buffer> = {}
): FileSystem & { files: Map<string, MockFileEntry> } {
  const files = new Map<string, MockFileEntry>();

  for (const [path, content] of Object.entries(initialFiles)) {
    files.set(path, {
      content,
      isDirectory: false,
    });
  }

  const normalize = (path: string): string => (path.endsWith("/") ? path.slice(0, -1) : path);

  const hasChildren = (path: string): boolean => {
    const prefix = normalize(path) + "/";
    for (const filePath of files.keys()) {
      if (filePath.startsWith(prefix)) return true;
    }
    return false;
  };

  return {
    files,

    readFile(path: string): string {
      const entry = files.get(path);
      if (!entry || entry.isDirectory) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return typeof entry.content === "string"
        ? entry.content
        : entry.content.toString("utf-8");
    },

    readFileBinary(path: string): Buffer {
      const entry = files.get(path);
      if (!entry || entry.isDirectory) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return typeof entry.content === "string"
        ? Buffer.from(entry.content)
        : entry.content;
    },

    writeFile(path: string, content: string): void {
      files.set(path, { content, isDirectory: false });
    },

    writeFileBinary(path: string, content: Buffer): void {
      files.set(path, { content, isDirectory: false });
    },

    exists(path: string): boolean {
      return files.has(normalize(path)) || hasChildren(path);
    },

    mkdir(path: string, _options?: { recursive?: boolean }): void {
      if (!files.has(normalize(path))) {
        files.set(normalize(path), { content: "", isDirectory: true });
      }
    },

    readdir(path: string): string[] {
      const normalizedPath = normalize(path);
      const results: Set<string> = new Set();

      for (const filePath of files.keys()) {
        if (filePath.startsWith(normalizedPath + "/")) {
          const relativePath = filePath.slice(normalizedPath.length + 1);
          const firstPart = relativePath.split("/")[0];
          if (firstPart) {
            results.add(firstPart);
          }
        }
      }

      return Array.from(results);
    },

    stat(path: string): { isDirectory: boolean; isFile: boolean; size: number } {
      const entry = files.get(normalize(path));
      if (!entry) {
        if (hasChildren(path)) {
          return { isDirectory: true, isFile: false, size: 0 };
        }
        throw new Error(`ENOENT: no such file or directory, stat '${path}'`);
      }

      if (entry.isDirectory) {
        return { isDirectory: true, isFile: false, size: 0 };
      }

      return { isDirectory: false, isFile: true, size: entry.content.length };
    },

    unlink(path: string): void {
      files.delete(path);
    },

    rmdir(path: string, _options?: { recursive?: boolean }): void {
      const normalizedPath = normalize(path);
      for (const filePath of files.keys()) {
        if (filePath === normalizedPath || filePath.startsWith(normalizedPath + "/")) {
          files.delete(filePath);
        }
      }
    },

    copyFile(src: string, dest: string): void {
      const entry = files.get(src);
      if (!entry) {
        throw new Error(`ENOENT: no such file or directory, copyfile '${src}'`);
      }
      files.set(dest, { ...entry });
    },
  };
}

/**
 * Recorded HTTP request
 */
export interface HttpCall {
  url: string;
  options?: RequestInit;
}

/**
 * Create a mock HttpClient with predefined responses.
 * Unknown URLs answer 404; every request is recorded in `calls`.
 */
export function createMockHttpClient(
  responses: Map<string, Response | (() => Response)> = new Map()
): HttpClient & { responses: Map<string, Response | (() => Response)>; calls: HttpCall[] } {
  const calls: HttpCall[] = [];

  return {
    responses,
    calls,

    async fetch(url: string, options?: RequestInit): Promise<Response> {
      calls.push({ url, options });
      const responseOrFactory = responses.get(url);

      if (!responseOrFactory) {
        return new Response(null, {
          status: 404,
          statusText: "Not Found",
        });
      }

      return typeof responseOrFactory === "function"
        ? responseOrFactory()
        : responseOrFactory;
    },
  };
}

/**
 * Recorded shell execution call
 */
export interface ShellCall {
  command: string;
  args: string[];
}

export type ShellResult = string | Error | ((args: string[]) => string);

/**
 * Create a mock ShellExecutor with predefined command outputs.
 * Matching is done against the command name; a function result receives the args.
 */
export function createMockShellExecutor(
  results: Record<string, ShellResult> = {}
): ShellExecutor & { calls: ShellCall[] } {
  const calls: ShellCall[] = [];

  return {
    calls,

    execFile(command: string, args: string[]): string {
      calls.push({ command, args });

      const result = results[command];
      if (result === undefined) {
        // Default: command succeeded without output
        return "";
      }
      if (result instanceof Error) {
        throw result;
      }
      return typeof result === "function" ? result(args) : result;
    },
  };
}

/**
 * Recorded log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  fields: LogFields;
}

/**
 * Create a Logger that records entries (children share the same record)
 */
export function createMockLogger(
  entries: LogEntry[] = [],
  bound: LogFields = {}
): Logger & { entries: LogEntry[] } {
  const record = (level: LogLevel) => (message: string, fields?: LogFields) => {
    entries.push({ level, message, fields: { ...bound, ...fields } });
  };

  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    child: (fields) => createMockLogger(entries, { ...bound, ...fields }),
  };
}

/**
 * Create a mock SecretProvider
 */
export function createMockSecretProvider(
  secrets: { sourceToken?: string; webhookSecret?: string } = {}
): SecretProvider {
  return {
    getSourceToken: () => secrets.sourceToken,
    getWebhookSecret: () => secrets.webhookSecret,
  };
}

/**
 * Create an EngineContext built from mocks, overridable per field
 */
export function createMockContext(overrides: Partial<EngineContext> = {}): EngineContext {
  return {
    fs: createMockFileSystem(),
    http: createMockHttpClient(),
    shell: createMockShellExecutor(),
    logger: createMockLogger(),
    secrets: createMockSecretProvider(),
    paths: { workDir: "/work" },
    ...overrides,
  };
}

/**
 * Helper to create a successful JSON response
 */
export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * Helper to create an error response
 */
export function errorResponse(status: number, statusText: string): Response {
  return new Response(null, { status, statusText });
}

/**
 * Helper to create a binary response
 */
export function binaryResponse(data: Buffer | Uint8Array, status = 200): Response {
  return new Response(new Uint8Array(data), {
    status,
    headers: { "Content-Type": "application/octet-stream" },
  });
}
