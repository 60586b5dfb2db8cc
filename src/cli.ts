#!/usr/bin/env node
import process from "node:process";
import { realpathSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { z } from "zod";

import { EngineClient } from "./engine/client.js";
import { canonicalizeGraph } from "./graph/canonicalize.js";
import { describeEngine } from "./job/diagnostics.js";
import { parseJobInput } from "./job/input.js";
import { JobRunner } from "./job/runner.js";
import { StructuredLogger } from "./logger.js";
import { collectRedactionTokens, loadWorkerConfig } from "./worker/config.js";
import { isFailurePayload } from "./worker/types.js";

const jobFileSchema = z.object({
  id: z.string().min(1).optional(),
  input: z.unknown(),
});

export type CliOptions =
  | { readonly command: "run" | "canonicalize"; readonly file: string }
  | { readonly command: "diagnose" };

function printUsage(): void {
  console.error(`Usage:
  render-worker run <job.json>              Run one job ({"id"?, "input"}) and print the result payload
  render-worker canonicalize <workflow.json> Print the canonical form of a workflow graph
  render-worker diagnose                    Log the engine devices and memory`);
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const [command, file] = argv;
  if (command === "diagnose") {
    return { command };
  }
  if ((command === "run" || command === "canonicalize") && file) {
    return { command, file };
  }
  throw new Error(`Invalid arguments: ${argv.join(" ") || "(none)"}`);
}

async function readJson(file: string): Promise<unknown> {
  const contents = await readFile(file, "utf8");
  return JSON.parse(contents);
}

export async function main(argv: readonly string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    printUsage();
    return 1;
  }

  if (options.command === "canonicalize") {
    const input = parseJobInput({ workflow: await readJson(options.file) });
    console.log(JSON.stringify(canonicalizeGraph(input.workflow), null, 2));
    return 0;
  }

  const config = loadWorkerConfig();
  const logger = new StructuredLogger({ logFile: config.logFile, redactSecrets: collectRedactionTokens(config) });
  try {
    if (options.command === "diagnose") {
      const diagnostics = await describeEngine(new EngineClient(config.engine, { logger }), logger);
      return diagnostics ? 0 : 1;
    }

    const job = jobFileSchema.parse(await readJson(options.file));
    const runner = new JobRunner({ config, logger });
    const payload = await runner.run({ id: job.id ?? `local-${Date.now()}`, input: job.input });
    console.log(JSON.stringify(payload, null, 2));
    return isFailurePayload(payload) ? 1 : 0;
  } finally {
    await logger.flush();
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    // npm links `bin` scripts, so compare against the resolved path.
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    });
}
