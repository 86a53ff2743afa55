import fs from "node:fs";
import zlib from "node:zlib";

import { InvalidArgumentError } from "commander";

/** Commander option parser for a TCP port. */
export function parsePort(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || String(n) !== value.trim() || n < 1 || n > 65535) {
    throw new InvalidArgumentError(`Invalid port '${value}'`);
  }
  return n;
}

/** Commander option parser for a positive integer such as a timeout in ms. */
export function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || String(n) !== value.trim() || n <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'`);
  }
  return n;
}

export interface Submission {
  body: Buffer;
  headers: Record<string, string>;
}

/**
 * Build the request for posting a device document. The file must hold a JSON object;
 * with `gzip` the body is compressed and marked with Content-Encoding.
 */
export function buildSubmission(text: string, gzip = false): Submission {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    throw new Error("Invalid JSON provided");
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new Error("Device document must be a JSON object");
  }

  const raw = Buffer.from(text, "utf8");
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (!gzip) return { body: raw, headers };
  headers["Content-Encoding"] = "gzip";
  return { body: zlib.gzipSync(raw), headers };
}

export function readSubmissionFile(filePath: string, gzip = false): Submission {
  return buildSubmission(fs.readFileSync(filePath, "utf8"), gzip);
}
