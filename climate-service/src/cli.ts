#!/usr/bin/env node
import { config as loadEnv } from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadConfig } from "./config.js";
import { toErrorPayload } from "./errors.js";
import { createLogger } from "./logger.js";
import { createPipeline } from "./pipeline.js";
import { summarizeDelta } from "./summary.js";

const thisDir = path.dirname(fileURLToPath(import.meta.url));
const serviceRoot = path.resolve(thisDir, "..");
const envFiles = [".env", ".env.local"];
for (const file of envFiles) {
  loadEnv({ path: path.join(serviceRoot, file), override: true });
}

async function main(): Promise<number> {
  const location = process.argv.slice(2).join(" ").trim();
  if (!location) {
    process.stderr.write("Usage: climate-delta <ZIP | \"City, ST\">\n");
    return 2;
  }

  const config = loadConfig();
  const logger = createLogger(config, 2);
  const { orchestrator } = await createPipeline(config, logger);

  try {
    const result = await orchestrator.handle(location);
    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    for (const line of summarizeDelta(result)) {
      process.stdout.write(`${line}\n`);
    }
    return 0;
  }
  catch (err) {
    const payload = toErrorPayload(err);
    process.stderr.write(`${payload.error}: ${payload.message}\n`);
    return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(`Failed to start: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  });
