import dotenv from "dotenv";
import path from "path";
import fs from "fs";
import { DEFAULT_PROVENANCE, type Provenance } from "@ocr-layout/core";

export interface ApiConfig {
  port: number;
  bodyLimit: string;
  provenance: Provenance;
  skipFailedLines: boolean;
}

// Repo root .env first, then app-local overrides.
export function loadEnv(): void {
  const rootEnv = path.resolve(__dirname, "../../../.env");
  if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
  dotenv.config();
}

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") return fallback;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const port = Number(env.API_PORT ?? 3001);
  return {
    port: Number.isFinite(port) ? port : 3001,
    bodyLimit: env.API_BODY_LIMIT || "25mb",
    provenance: {
      creator: env.ALTO_SOFTWARE_CREATOR || DEFAULT_PROVENANCE.creator,
      name: env.ALTO_SOFTWARE_NAME || DEFAULT_PROVENANCE.name,
      version: env.ALTO_SOFTWARE_VERSION || DEFAULT_PROVENANCE.version,
    },
    skipFailedLines: flag(env.SKIP_FAILED_LINES, true),
  };
}
