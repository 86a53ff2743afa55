import { AxiosError, AxiosHeaders, type AxiosResponse } from "axios";
import { z } from "zod";

import { discover, formatAsTable, handleAxiosError, unwrap } from "../client";
import { formatDeviceTable } from "../commands/devices";
import { formatStatus } from "../commands/status";

function responseError(status: number, data: unknown): AxiosError {
  const config = { headers: new AxiosHeaders() };
  const response: AxiosResponse = { data, status, statusText: "", headers: {}, config };
  return new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_REQUEST", config, undefined, response);
}

describe("discover", () => {
  it("falls back to the environment and then defaults", () => {
    expect(discover({}, {})).toEqual({ host: "127.0.0.1", port: 8000, key: null, baseURL: "http://127.0.0.1:8000" });
    expect(discover({}, { DW_HOST: "hub", DW_PORT: "9000", DW_ACCESS_KEY: "test-secret" })).toEqual({
      host: "hub",
      port: 9000,
      key: "test-secret",
      baseURL: "http://hub:9000",
    });
  });

  it("prefers flags over the environment", () => {
    const d = discover({ host: "10.0.0.2", port: 8123, key: "flag-key" }, { DW_HOST: "hub", DW_ACCESS_KEY: "test-secret" });
    expect(d).toEqual({ host: "10.0.0.2", port: 8123, key: "flag-key", baseURL: "http://10.0.0.2:8123" });
  });
});

describe("handleAxiosError", () => {
  it("maps server error codes to exit codes", () => {
    const forbidden = handleAxiosError(responseError(403, { error: { code: "FORBIDDEN", message: "Access forbidden." } }));
    expect(forbidden).toEqual({
      exitCode: 3,
      message: "FORBIDDEN: Access forbidden.",
      json: { error: { code: "FORBIDDEN", message: "Access forbidden." } },
    });

    const invalid = handleAxiosError(responseError(400, { error: { code: "VALIDATION_ERROR", message: "Missing required key: Output" } }));
    expect(invalid.exitCode).toBe(2);

    const none = handleAxiosError(responseError(404, { error: { code: "NO_DEVICES", message: "No device states are available" } }));
    expect(none.exitCode).toBe(4);

    const unavailable = handleAxiosError(responseError(503, { error: { code: "STORE_UNAVAILABLE", message: "gone" } }));
    expect(unavailable.exitCode).toBe(1);
  });

  it("falls back to the HTTP status without an error envelope", () => {
    const tooLarge = handleAxiosError(responseError(413, "too big"));
    expect(tooLarge.exitCode).toBe(2);
    expect(tooLarge.message).toBe("HTTP_413: Request failed with status code 413");
  });

  it("reports an unreachable server", () => {
    const mapped = handleAxiosError(new AxiosError("connect ECONNREFUSED", "ECONNREFUSED"));
    expect(mapped.exitCode).toBe(6);
    expect(mapped.json.error.code).toBe("UNREACHABLE");
  });

  it("passes other errors through", () => {
    expect(handleAxiosError(new Error("Unexpected response from server: bad"))).toEqual({
      exitCode: 1,
      message: "Unexpected response from server: bad",
      json: { error: { code: "CLIENT_ERROR", message: "Unexpected response from server: bad" } },
    });
  });
});

describe("unwrap", () => {
  it("validates the data envelope", () => {
    expect(unwrap({ data: { status: "ok" } }, z.object({ status: z.string() }))).toEqual({ status: "ok" });
    expect(() => unwrap({ data: { status: 1 } }, z.object({ status: z.string() }))).toThrow(/^Unexpected response from server: /);
  });
});

describe("text output", () => {
  it("formatAsTable pads every column to its widest cell", () => {
    const table = formatAsTable(
      [{ a: "1", b: "xyz" }, { a: "10", b: "q" }],
      [{ key: "a", header: "A" }, { key: "b", header: "Bee" }]
    );
    expect(table.split("\n")).toEqual(["A   Bee", "--  ---", "1   xyz", "10  q  "]);
    expect(formatAsTable([], [{ key: "a", header: "A" }])).toBe("");
  });

  it("formatDeviceTable lists one row per device", () => {
    expect(formatDeviceTable([])).toBe("No devices");
    const table = formatDeviceTable([{
      index: 0,
      name: "pump",
      fileName: "pump.json",
      type: "PowerController",
      description: "Power Controller",
      urlName: "pump",
      lastSaveTime: "2026-03-01T10:00:00Z",
      artifacts: [],
    }]);
    expect(table.split("\n")[2]).toBe("0  pump  Power Controller  2026-03-01T10:00:00Z  0     ");
  });

  it("formatStatus summarises the server", () => {
    const text = formatStatus({
      status: "running",
      pid: 321,
      deviceCount: 2,
      lastReloadTime: null,
      latestSaveTime: "2026-03-01T10:00:00Z",
      phase: "idle",
      workerRunning: true,
      pageAutoRefresh: 10,
      stats: { fullReloads: 1 },
    }, "http://127.0.0.1:8000");
    expect(text).toBe([
      "Server: running (http://127.0.0.1:8000, pid 321)",
      "Devices: 2",
      "Last Reload: never",
      "Latest Save: 2026-03-01T10:00:00Z",
      "Refresh Worker: running (idle)",
      "Cache:",
      "  fullReloads: 1",
    ].join("\n"));
  });
});
