import axios, { AxiosInstance } from "axios";
import { z } from "zod";

export type ExitCode =
  | 0  // Success
  | 1  // General/server error
  | 2  // Validation error
  | 3  // Access key rejected
  | 4  // Not found
  | 6; // Server not running/unreachable

export type GlobalFlags = {
  host?: string;
  port?: number;
  key?: string;
  json?: boolean;
  timeout?: number;
  debug?: boolean;
};

export interface Discovery {
  host: string;
  port: number;
  key: string | null;
  baseURL: string;
}

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 8000;
const DEFAULT_TIMEOUT = 10_000;

const ApiErrorEnvelope = z.object({
  error: z.object({ code: z.string(), message: z.string() }),
});

const DataEnvelope = z.object({ data: z.unknown() });

export function discover(flags: GlobalFlags, env: NodeJS.ProcessEnv = process.env): Discovery {
  const host = flags.host || env.DW_HOST || DEFAULT_HOST;
  const port = flags.port || toInt(env.DW_PORT) || DEFAULT_PORT;
  const key = flags.key || env.DW_ACCESS_KEY || null;
  return { host, port, key, baseURL: `http://${host}:${port}` };
}

export function createClient(d: Discovery, flags: GlobalFlags): AxiosInstance {
  const timeout = typeof flags.timeout === "number" && flags.timeout > 0 ? flags.timeout : DEFAULT_TIMEOUT;
  const instance = axios.create({
    baseURL: d.baseURL,
    timeout,
    params: d.key ? { key: d.key } : undefined,
  });

  if (flags.debug) {
    instance.interceptors.request.use((config) => {
      console.error("[dw][http] >>", config.method?.toUpperCase(), (config.baseURL ?? "") + (config.url ?? ""), {
        timeout: config.timeout,
      });
      return config;
    });
    instance.interceptors.response.use(
      (res) => {
        console.error("[dw][http] <<", res.status, res.config.url);
        return res;
      },
      (err: unknown) => {
        if (axios.isAxiosError(err)) console.error("[dw][http] !!", err.code, err.message);
        return Promise.reject(err);
      }
    );
  }

  return instance;
}

/** Unwrap the `{ data }` envelope and validate the payload. */
export function unwrap<T>(body: unknown, schema: z.ZodType<T>): T {
  const envelope = DataEnvelope.safeParse(body);
  const parsed = schema.safeParse(envelope.success ? envelope.data.data : body);
  if (!parsed.success) {
    throw new Error(`Unexpected response from server: ${parsed.error.issues[0]?.message ?? "invalid payload"}`);
  }
  return parsed.data;
}

export function formatAsTable<T extends Record<string, unknown>>(rows: T[], columns: { key: keyof T; header: string }[]): string {
  if (rows.length === 0) return "";
  const widths = columns.map((c) => Math.max(c.header.length, ...rows.map((r) => String(r[c.key] ?? "").length)));
  const header = columns.map((c, i) => pad(c.header, widths[i] ?? 0)).join("  ");
  const sep = widths.map((w) => "-".repeat(w)).join("  ");
  const body = rows.map((r) => columns.map((c, i) => pad(String(r[c.key] ?? ""), widths[i] ?? 0)).join("  ")).join("\n");
  return header + "\n" + sep + "\n" + body;
}

const EXIT_BY_CODE: Record<string, ExitCode> = {
  VALIDATION_ERROR: 2,
  FORBIDDEN: 3,
  NOT_FOUND: 4,
  NO_DEVICES: 4,
  FILE_SYSTEM_ERROR: 1,
  STORE_UNAVAILABLE: 1,
  INTERNAL_ERROR: 1,
};

export interface MappedError {
  exitCode: ExitCode;
  message: string;
  json: { error: { code: string; message: string } };
}

export function handleAxiosError(err: unknown): MappedError {
  if (!axios.isAxiosError(err)) {
    const message = err instanceof Error ? err.message : String(err);
    return { exitCode: 1, message, json: { error: { code: "CLIENT_ERROR", message } } };
  }

  // Connection refused, reset or timed out
  if (!err.response) {
    const message = "Server not running or unreachable. Check --host/--port (or DW_HOST/DW_PORT).";
    return { exitCode: 6, message, json: { error: { code: "UNREACHABLE", message } } };
  }

  const status = err.response.status;
  const envelope = ApiErrorEnvelope.safeParse(err.response.data);
  const code = envelope.success ? envelope.data.error.code : `HTTP_${status}`;
  const message = envelope.success ? envelope.data.error.message : err.message;

  let exitCode: ExitCode = EXIT_BY_CODE[code] ?? 1;
  if (!envelope.success) {
    // Fallback by HTTP status
    if (status === 400 || status === 413) exitCode = 2;
    else if (status === 403) exitCode = 3;
    else if (status === 404) exitCode = 4;
  }
  return { exitCode, message: `${code}: ${message}`, json: { error: { code, message } } };
}

export function printJsonOrText(payload: unknown, flags: GlobalFlags, fallbackText?: string): void {
  if (flags.json) {
    console.log(JSON.stringify(payload, null, 2));
  } else if (typeof fallbackText === "string") {
    console.log(fallbackText);
  } else {
    console.log(payload);
  }
}

/** Print a failed request the way the flags ask for and exit with its mapped code. */
export function failWith(error: unknown, flags: GlobalFlags): never {
  const mapped = handleAxiosError(error);
  if (flags.json) printJsonOrText(mapped.json, flags);
  else console.error(mapped.message);
  process.exit(mapped.exitCode);
}

function toInt(v: string | undefined): number | null {
  if (v === undefined) return null;
  const n = Number.parseInt(v, 10);
  return Number.isFinite(n) ? n : null;
}

function pad(s: string, width: number): string {
  if (s.length >= width) return s;
  return s + " ".repeat(width - s.length);
}
