import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { z } from "zod";
import { ConfigError, type GateConfig } from "@core-types";
import { ConfigFileSchema } from "./schema";

function deepFreeze<T>(obj: T): T {
  if (obj !== null && typeof obj === "object") {
    Object.freeze(obj);
    const values: unknown[] = Object.values(obj);
    for (const val of values) {
      if (val !== null && typeof val === "object" && !Object.isFrozen(val)) {
        deepFreeze(val);
      }
    }
  }
  return obj;
}

const cache = new Map<string, GateConfig>();

const HERE = path.dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = path.resolve(HERE, "..", "..", "..", "..");

function resolveConfigPath(preferred: string): string {
  const candidates = [
    preferred,
    path.resolve(process.cwd(), preferred),
    path.join(REPO_ROOT, preferred),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return path.resolve(candidate);
    }
  }

  throw new ConfigError(`Unable to locate gate configuration. Tried: ${candidates.join(", ")}`);
}

/** Tolerance bands and product limits from YAML, validated, frozen and cached per file. */
export function loadGateConfig(configPath = "config/default.yaml"): GateConfig {
  const resolved = resolveConfigPath(configPath);
  const hit = cache.get(resolved);
  if (hit) return hit;

  const raw = fs.readFileSync(resolved, "utf-8");
  let cfg: GateConfig;
  try {
    cfg = ConfigFileSchema.parse(YAML.parse(raw)).gate;
  } catch (err) {
    if (err instanceof z.ZodError) {
      const issues = err.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      console.error(`❌ Gate config validation failed: ${resolved}`);
      issues.forEach((i) => console.error(`  ${i}`));
      throw new ConfigError(`Invalid gate configuration in ${resolved}`, issues);
    }
    throw err;
  }

  const frozen = deepFreeze(cfg);
  cache.set(resolved, frozen);
  return frozen;
}

export function resetGateConfigCache(): void {
  cache.clear();
}
