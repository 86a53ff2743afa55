import type { Command } from "commander";
import { z } from "zod";

import { createClient, discover, failWith, printJsonOrText, unwrap, type GlobalFlags } from "../client";
import { readSubmissionFile } from "../util/parse";

const SubmitResultSchema = z.object({ message: z.string(), fileName: z.string() });

export function attachSubmitCommand(root: Command): void {
  root
    .command("submit")
    .description("Post a device state document to the server")
    .argument("<file>", "Path to the JSON document")
    .option("--gzip", "Compress the request body", false)
    .action(async (file: string, opts: { gzip?: boolean }) => {
      const flags = root.opts<GlobalFlags>();
      try {
        const submission = readSubmissionFile(file, opts.gzip === true);
        const d = discover(flags);
        const res = await createClient(d, flags).post("/api/submit", submission.body, { headers: submission.headers });
        const data = unwrap(res.data, SubmitResultSchema);
        printJsonOrText(data, flags, `${data.message} (${data.fileName})`);
        process.exit(0);
      } catch (error) {
        failWith(error, flags);
      }
    });
}
