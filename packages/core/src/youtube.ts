import fs from "node:fs/promises";
import { InputError } from "./errors";

export type YouTubeSourceKind = "video" | "playlist" | "channel" | "unknown";

const EXACT_YOUTUBE_HOSTS = new Set([
  "youtube.com",
  "www.youtube.com",
  "m.youtube.com",
  "music.youtube.com",
  "youtu.be",
  "www.youtu.be",
  "youtube-nocookie.com",
  "www.youtube-nocookie.com",
]);

const VIDEO_ID_RE = /^[A-Za-z0-9_-]{11}$/;

function normalizeHost(host: string): string {
  return host.trim().toLowerCase().replace(/\.+$/g, "");
}

function isVideoId(raw: string | null | undefined): boolean {
  return VIDEO_ID_RE.test(String(raw || "").trim());
}

export function isYouTubeHost(hostname: string): boolean {
  const host = normalizeHost(hostname);
  if (!host) return false;
  if (EXACT_YOUTUBE_HOSTS.has(host)) return true;
  return host.endsWith(".youtube.com") || host.endsWith(".youtube-nocookie.com");
}

export function isYouTubeUrl(url: string): boolean {
  try {
    const u = new URL(url);
    if (u.protocol !== "http:" && u.protocol !== "https:") return false;
    return isYouTubeHost(u.hostname);
  } catch {
    return false;
  }
}

/**
 * Trim a user-supplied source and add a scheme when it was typed without one
 * ("youtube.com/@name"). Returns null when the result is not a YouTube URL.
 */
export function normalizeSourceUrl(input: string): string | null {
  const trimmed = input.trim();
  if (!trimmed) return null;
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  return isYouTubeUrl(withScheme) ? withScheme : null;
}

export function classifyYouTubeSource(url: string): YouTubeSourceKind {
  if (!isYouTubeUrl(url)) return "unknown";
  const u = new URL(url);
  const host = normalizeHost(u.hostname);

  // https://youtu.be/VIDEO_ID
  if (host === "youtu.be" || host === "www.youtu.be") {
    return isVideoId(u.pathname.replace(/^\//, "").split("/")[0]) ? "video" : "unknown";
  }

  // https://www.youtube.com/watch?v=VIDEO_ID (a list param alongside v still means one video)
  if (isVideoId(u.searchParams.get("v"))) return "video";

  const parts = u.pathname.split("/").filter(Boolean);
  const head = parts[0]?.toLowerCase() ?? "";

  if (head === "playlist" && u.searchParams.get("list")) return "playlist";

  // /embed/ID, /shorts/ID, /live/ID
  if ((head === "embed" || head === "shorts" || head === "live" || head === "v") && isVideoId(parts[1])) {
    return "video";
  }

  // /@handle, /c/name, /channel/UC..., /user/name
  if (head.startsWith("@") && head.length > 1) return "channel";
  if ((head === "c" || head === "channel" || head === "user") && parts[1]) return "channel";

  return "unknown";
}

/** One URL per line; blank lines and `#` comments are skipped. */
export function parseUrlList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"));
}

export async function readUrlListFile(filePath: string): Promise<string[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new InputError(`File not found: ${filePath}`);
    }
    throw err;
  }
  return parseUrlList(text);
}

/**
 * Validate and de-duplicate source strings, keeping first-seen order.
 * Throws InputError naming every rejected entry.
 */
export function resolveSources(inputs: string[]): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  const rejected: string[] = [];

  for (const raw of inputs) {
    if (!raw.trim()) continue;
    const url = normalizeSourceUrl(raw);
    if (!url) {
      rejected.push(raw.trim());
      continue;
    }
    if (seen.has(url)) continue;
    seen.add(url);
    out.push(url);
  }

  if (rejected.length) {
    throw new InputError(`Not a YouTube URL: ${rejected.join(", ")}`);
  }
  return out;
}
