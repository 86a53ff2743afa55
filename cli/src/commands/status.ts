import type { Command } from "commander";
import { z } from "zod";

import { createClient, discover, failWith, printJsonOrText, unwrap, type GlobalFlags } from "../client";

const StatusSchema = z.object({
  status: z.string(),
  pid: z.number(),
  deviceCount: z.number(),
  lastReloadTime: z.string().nullable(),
  latestSaveTime: z.string().nullable(),
  phase: z.string(),
  workerRunning: z.boolean(),
  pageAutoRefresh: z.number(),
  stats: z.record(z.string(), z.number()),
});

export type ServerStatus = z.infer<typeof StatusSchema>;

export function formatStatus(data: ServerStatus, baseURL: string): string {
  const lines = [
    `Server: ${data.status} (${baseURL}, pid ${data.pid})`,
    `Devices: ${data.deviceCount}`,
    `Last Reload: ${data.lastReloadTime ?? "never"}`,
    `Latest Save: ${data.latestSaveTime ?? "n/a"}`,
    `Refresh Worker: ${data.workerRunning ? "running" : "stopped"} (${data.phase})`,
  ];
  const stats = Object.entries(data.stats);
  if (stats.length > 0) {
    lines.push("Cache:");
    for (const [name, value] of stats) lines.push(`  ${name}: ${value}`);
  }
  return lines.join("\n");
}

export function attachStatusCommand(root: Command): void {
  root
    .command("status")
    .description("Show server status and state cache statistics")
    .action(async () => {
      const flags = root.opts<GlobalFlags>();
      try {
        const d = discover(flags);
        const client = createClient(d, flags);
        const res = await client.get("/api/v1/status");
        const data = unwrap(res.data, StatusSchema);
        printJsonOrText(data, flags, formatStatus(data, d.baseURL));
        process.exit(0);
      } catch (error) {
        failWith(error, flags);
      }
    });
}
