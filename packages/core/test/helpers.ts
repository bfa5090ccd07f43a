import pino from "pino";
import type { VideoRecord } from "@tubechat/contracts";
import type { Logger } from "../src/logger";

export type LogLine = { level: number; msg: string; [k: string]: unknown };

export const silentLogger: Logger = pino({ level: "silent" });

/** A logger whose JSON lines land in `lines` instead of stdout. */
export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(chunk: string) {
        lines.push(JSON.parse(chunk));
      },
    },
  );
  return { logger, lines };
}

export const PINO_ERROR = 50;
export const PINO_WARN = 40;

export function makeVideo(overrides?: Partial<VideoRecord>): VideoRecord {
  return {
    id: "vid00000001",
    title: "A test video",
    url: "https://www.youtube.com/watch?v=vid00000001",
    description: "Test description",
    publishedAt: "2024-01-01",
    transcript: "hello world",
    viewCount: 1200,
    duration: "5:00",
    ...overrides,
  };
}

type FakeRoute = (url: URL, init: RequestInit | undefined) => Response | Promise<Response>;

export type RecordedCall = { method: string; url: URL; body: string | null; headers: Headers };

/** In-process stand-in for `fetch`: the route callback decides every response. */
export function fakeFetch(route: FakeRoute) {
  const calls: RecordedCall[] = [];
  const f = async (input: string | URL, init?: RequestInit): Promise<Response> => {
    const url = new URL(String(input));
    calls.push({
      method: init?.method ?? "GET",
      url,
      body: typeof init?.body === "string" ? init.body : null,
      headers: new Headers(init?.headers),
    });
    return route(url, init);
  };
  return { fetch: f, calls };
}

export function jsonResponse(body: unknown, status = 200, headers?: Record<string, string>): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...(headers ?? {}) },
  });
}
