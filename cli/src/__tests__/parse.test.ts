import zlib from "node:zlib";

import { InvalidArgumentError } from "commander";

import { buildSubmission, parsePort, parsePositiveInt } from "../util/parse";

describe("option parsers", () => {
  it("parsePort accepts ports in range", () => {
    expect(parsePort("8080")).toBe(8080);
    expect(parsePort("1")).toBe(1);
  });

  it("parsePort rejects anything else", () => {
    expect(() => parsePort("0")).toThrow(InvalidArgumentError);
    expect(() => parsePort("65536")).toThrow("Invalid port '65536'");
    expect(() => parsePort("80a")).toThrow(InvalidArgumentError);
  });

  it("parsePositiveInt rejects zero and fractions", () => {
    expect(parsePositiveInt("250")).toBe(250);
    expect(() => parsePositiveInt("0")).toThrow("Expected a positive integer, got '0'");
    expect(() => parsePositiveInt("1.5")).toThrow(InvalidArgumentError);
  });
});

describe("buildSubmission", () => {
  const text = '{"StateFileType":"PowerController","DeviceName":"pump"}';

  it("sends plain JSON by default", () => {
    const submission = buildSubmission(text);
    expect(submission.headers).toEqual({ "Content-Type": "application/json" });
    expect(submission.body.toString("utf8")).toBe(text);
  });

  it("compresses with gzip on request", () => {
    const submission = buildSubmission(text, true);
    expect(submission.headers).toEqual({ "Content-Type": "application/json", "Content-Encoding": "gzip" });
    expect(zlib.gunzipSync(submission.body).toString("utf8")).toBe(text);
  });

  it("requires a JSON object", () => {
    expect(() => buildSubmission("{oops")).toThrow("Invalid JSON provided");
    expect(() => buildSubmission("[1]")).toThrow("Device document must be a JSON object");
    expect(() => buildSubmission("null")).toThrow("Device document must be a JSON object");
  });
});
