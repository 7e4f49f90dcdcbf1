import dotenv from "dotenv";
import path from "path";
import fs from "fs";
import { DEFAULT_PROVENANCE, getLogger } from "@ocr-layout/core";
import { convertDirectory } from "./convert";

// Load env from repo root first, then allow app-local overrides
function loadEnv(): void {
  const rootEnv = path.resolve(__dirname, "../../../.env");
  if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
  dotenv.config();
}

export async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const logger = getLogger("worker");
  const inputDir = env.WORKER_INPUT_DIR;
  if (!inputDir) {
    logger.error("worker.config", { error: "WORKER_INPUT_DIR is not set" });
    return 1;
  }
  const outputDir = env.WORKER_OUTPUT_DIR || inputDir;
  const results = await convertDirectory(inputDir, outputDir, {
    logger,
    skipFailedLines: env.SKIP_FAILED_LINES !== "false",
    provenance: {
      creator: env.ALTO_SOFTWARE_CREATOR || DEFAULT_PROVENANCE.creator,
      name: env.ALTO_SOFTWARE_NAME || DEFAULT_PROVENANCE.name,
      version: env.ALTO_SOFTWARE_VERSION || DEFAULT_PROVENANCE.version,
    },
  });
  return results.some((r) => r.error !== undefined) ? 1 : 0;
}

if (require.main === module) {
  loadEnv();
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      getLogger("worker").error("worker.crashed", { error: err instanceof Error ? err.message : String(err) });
      process.exitCode = 1;
    });
}
