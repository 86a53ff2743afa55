import type { Command } from "commander";
import { z } from "zod";

import { createClient, discover, failWith, formatAsTable, printJsonOrText, unwrap, type GlobalFlags } from "../client";

const DeviceSummarySchema = z.object({
  index: z.number(),
  name: z.string(),
  fileName: z.string(),
  type: z.string(),
  description: z.string(),
  urlName: z.string(),
  lastSaveTime: z.string(),
  artifacts: z.array(z.string()),
});

const DeviceDetailSchema = z.object({
  index: z.number(),
  nextIndex: z.number().nullable(),
  device: DeviceSummarySchema,
  document: z.record(z.string(), z.unknown()),
});

const DeviceValueSchema = z.object({
  index: z.number(),
  path: z.array(z.string()),
  value: z.unknown(),
});

export type DeviceSummary = z.infer<typeof DeviceSummarySchema>;

export function formatDeviceTable(devices: DeviceSummary[]): string {
  if (devices.length === 0) return "No devices";
  const rows = devices.map((d) => ({
    index: String(d.index),
    name: d.name,
    type: d.description,
    saved: d.lastSaveTime,
    charts: String(d.artifacts.length),
  }));
  return formatAsTable(rows, [
    { key: "index", header: "#" },
    { key: "name", header: "Name" },
    { key: "type", header: "Type" },
    { key: "saved", header: "Last Saved" },
    { key: "charts", header: "Charts" },
  ]);
}

export function attachDevicesCommand(root: Command): void {
  const devices = root
    .command("devices")
    .description("List cached device states")
    .action(async () => {
      const flags = root.opts<GlobalFlags>();
      try {
        const d = discover(flags);
        const res = await createClient(d, flags).get("/api/v1/devices");
        const data = unwrap(res.data, z.array(DeviceSummarySchema));
        printJsonOrText(data, flags, formatDeviceTable(data));
        process.exit(0);
      } catch (error) {
        failWith(error, flags);
      }
    });

  devices
    .command("show")
    .description("Show one device document, selected like the dashboard pages do")
    .argument("[index]", "Device index; negative counts from the end")
    .option("--name <urlName>", "Select by URL name instead of index")
    .action(async (index: string | undefined, opts: { name?: string }) => {
      const flags = root.opts<GlobalFlags>();
      try {
        const d = discover(flags);
        const params: Record<string, string> = {};
        if (index !== undefined) params.state_idx = index;
        if (opts.name) params.state_name = opts.name;
        const res = await createClient(d, flags).get("/api/v1/device", { params: { ...(d.key ? { key: d.key } : {}), ...params } });
        const data = unwrap(res.data, DeviceDetailSchema);
        const header = `${data.device.name} (${data.device.description}) [${data.index}]`;
        printJsonOrText(data, flags, header + "\n" + JSON.stringify(data.document, null, 2));
        process.exit(0);
      } catch (error) {
        failWith(error, flags);
      }
    });

  devices
    .command("value")
    .description("Read one value from a device document")
    .argument("<index>", "Device index")
    .argument("[path]", "Dotted path, e.g. Output.IsOn")
    .action(async (index: string, valuePath: string | undefined) => {
      const flags = root.opts<GlobalFlags>();
      try {
        const d = discover(flags);
        const url = `/api/v1/devices/${encodeURIComponent(index)}/value`;
        const res = await createClient(d, flags).get(url, {
          params: { ...(d.key ? { key: d.key } : {}), ...(valuePath ? { path: valuePath } : {}) },
        });
        const data = unwrap(res.data, DeviceValueSchema);
        printJsonOrText(data, flags, JSON.stringify(data.value, null, 2));
        process.exit(0);
      } catch (error) {
        failWith(error, flags);
      }
    });
}
