import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import YAML from "yaml";
import { AppConfigSchema, LogLevelSchema } from "./schema";
import type { AppConfig } from "./schema";

function deepFreeze<T extends object>(obj: T): T {
  Object.freeze(obj);
  for (const val of Object.values(obj)) {
    if (val && typeof val === "object" && !Object.isFrozen(val)) {
      deepFreeze(val);
    }
  }
  return obj;
}

let cached: AppConfig | null = null;

const HERE = path.dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = path.resolve(HERE, "..", "..", "..", "..");

export const DEFAULT_CONFIG_PATH = "config/default.yaml";

function resolveConfigPath(preferred: string): string {
  const candidates = [
    preferred,
    path.resolve(process.cwd(), preferred),
    path.join(REPO_ROOT, preferred),
    path.join(REPO_ROOT, DEFAULT_CONFIG_PATH),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  throw new Error(
    `Unable to locate configuration file. Tried: ${candidates.join(", ")}`
  );
}

/** Apply PORT / HOST / LOG_LEVEL on top of the parsed file. */
function applyEnv(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!raw || typeof raw !== "object") return raw;
  const doc: Record<string, unknown> = { ...raw };
  const server = typeof doc.server === "object" && doc.server ? { ...doc.server } : {};
  const logging = typeof doc.logging === "object" && doc.logging ? { ...doc.logging } : {};

  if (env.PORT) Object.assign(server, { port: Number(env.PORT) });
  if (env.HOST) Object.assign(server, { host: env.HOST });
  if (env.LOG_LEVEL) {
    const level = LogLevelSchema.safeParse(env.LOG_LEVEL.toLowerCase());
    if (level.success) Object.assign(logging, { level: level.data });
  }

  return { ...doc, server, logging };
}

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): AppConfig {
  return deepFreeze(AppConfigSchema.parse(applyEnv(raw, env)));
}

export function loadConfig(configPath = process.env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH): AppConfig {
  if (cached) return cached;

  const resolved = resolveConfigPath(configPath);
  const raw = fs.readFileSync(resolved, "utf-8");
  cached = parseConfig(YAML.parse(raw), process.env);
  return cached;
}

export function resetConfigCache() {
  cached = null;
}
