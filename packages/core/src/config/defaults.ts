import fs from "node:fs";
import path from "node:path";

const BASE_DEFAULTS = {
  TUBECHAT_TRANSCRIPTS_DIR: "data/transcripts",
  TUBECHAT_GEMINI_MODEL: "gemini-2.5-flash",
  TUBECHAT_APIFY_ACTOR: "streamers/youtube-scraper",
  TUBECHAT_MAX_VIDEOS: "50",
  TUBECHAT_SCRAPE_CONCURRENCY: "4",
  APIFY_BASE_URL: "https://api.apify.com",
  GEMINI_BASE_URL: "https://generativelanguage.googleapis.com",
} as const;

export type TubechatDefaultKey = keyof typeof BASE_DEFAULTS;

type ResolvedDefaults = Record<TubechatDefaultKey, string>;

function clean(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function parseDotEnv(text: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;
    const m = line.match(/^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let value = m[2] ?? "";
    if (
      (value.startsWith('"') && value.endsWith('"') && value.length >= 2) ||
      (value.startsWith("'") && value.endsWith("'") && value.length >= 2)
    ) {
      value = value.slice(1, -1);
    }
    out[key] = value;
  }
  return out;
}

function findUp(startDir: string, fileName: string, maxDepth = 8): string | null {
  let dir = startDir;
  for (let i = 0; i < maxDepth; i++) {
    const candidate = path.join(dir, fileName);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

export function readDotEnvFile(fileName: string, startDir: string = process.cwd()): Record<string, string> {
  const file = findUp(startDir, fileName, 8);
  if (!file) return {};
  try {
    return parseDotEnv(fs.readFileSync(file, "utf8"));
  } catch {
    // An unreadable dotenv file counts as absent.
    return {};
  }
}

/**
 * Copy `.env` entries into `env` without overwriting values that are already set.
 * Returns the keys that were filled in.
 */
export function loadDotEnv(
  env: Record<string, string | undefined> = process.env,
  startDir: string = process.cwd(),
): string[] {
  const fromFile = readDotEnvFile(".env", startDir);
  const loaded: string[] = [];
  for (const [key, value] of Object.entries(fromFile)) {
    if (clean(env[key])) continue;
    env[key] = value;
    loaded.push(key);
  }
  return loaded;
}

let cachedDefaults: ResolvedDefaults | null = null;

function resolveDefaults(): ResolvedDefaults {
  if (cachedDefaults) return cachedDefaults;
  const envExample = readDotEnvFile(".env.example");
  const envLocal = readDotEnvFile(".env");
  const pick = (key: TubechatDefaultKey): string =>
    clean(envLocal[key]) || clean(envExample[key]) || BASE_DEFAULTS[key];

  cachedDefaults = {
    TUBECHAT_TRANSCRIPTS_DIR: pick("TUBECHAT_TRANSCRIPTS_DIR"),
    TUBECHAT_GEMINI_MODEL: pick("TUBECHAT_GEMINI_MODEL"),
    TUBECHAT_APIFY_ACTOR: pick("TUBECHAT_APIFY_ACTOR"),
    TUBECHAT_MAX_VIDEOS: pick("TUBECHAT_MAX_VIDEOS"),
    TUBECHAT_SCRAPE_CONCURRENCY: pick("TUBECHAT_SCRAPE_CONCURRENCY"),
    APIFY_BASE_URL: pick("APIFY_BASE_URL"),
    GEMINI_BASE_URL: pick("GEMINI_BASE_URL"),
  };
  return cachedDefaults;
}

export function getTubechatDefault(
  key: TubechatDefaultKey,
  env: Record<string, string | undefined> = process.env,
): string {
  return clean(env[key]) || resolveDefaults()[key];
}

export function getTubechatDefaultNumber(
  key: TubechatDefaultKey,
  fallback: number,
  env: Record<string, string | undefined> = process.env,
): number {
  const parsed = Number(getTubechatDefault(key, env));
  if (!Number.isFinite(parsed)) return fallback;
  return Math.max(1, Math.floor(parsed));
}

/** Like getTubechatDefaultNumber, but "Infinity" (or "unbounded") lifts the cap. */
export function getTubechatConcurrency(
  key: TubechatDefaultKey,
  fallback: number,
  env: Record<string, string | undefined> = process.env,
): number {
  const raw = getTubechatDefault(key, env).toLowerCase();
  if (raw === "infinity" || raw === "unbounded") return Number.POSITIVE_INFINITY;
  return getTubechatDefaultNumber(key, fallback, env);
}
