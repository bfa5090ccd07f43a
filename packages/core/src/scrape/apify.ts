import {
  ApifyDatasetItemsSchema,
  ApifyErrorSchema,
  ApifyRunResponseSchema,
  ApifyTaskResponseSchema,
  type ApifyRun,
  type ApifyTask,
} from "@tubechat/contracts";
import type { z } from "zod";
import { RemoteJobError, errorMessage } from "../errors";

type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export const TERMINAL_RUN_STATUSES = new Set(["SUCCEEDED", "FAILED", "TIMED-OUT", "ABORTED"]);

function cleanBaseUrl(baseUrl: string): string {
  const trimmed = baseUrl.trim();
  if (!trimmed) throw new Error("baseUrl is required");
  return trimmed.endsWith("/") ? trimmed.slice(0, -1) : trimmed;
}

// "streamers/youtube-scraper" is addressed as "streamers~youtube-scraper" in API paths.
export function actorPathId(actorId: string): string {
  return encodeURIComponent(actorId.trim().replace("/", "~"));
}

async function readError(res: Response): Promise<RemoteJobError> {
  const txt = await res.text().catch(() => "");
  try {
    const parsed = ApifyErrorSchema.parse(JSON.parse(txt));
    return new RemoteJobError(parsed.error.message, { status: res.status, code: parsed.error.type });
  } catch {
    return new RemoteJobError(txt || `HTTP ${res.status}`, { status: res.status, code: "http_error" });
  }
}

export type ApifyClient = ReturnType<typeof createApifyClient>;

export function createApifyClient(opts: {
  token: string;
  baseUrl?: string;
  fetch?: FetchLike;
  /** Server-side long-poll per request, capped by the API at 60 seconds. */
  waitSecs?: number;
}) {
  const token = opts.token.trim();
  if (!token) throw new Error("Apify token is required");
  const baseUrl = cleanBaseUrl(opts.baseUrl ?? "https://api.apify.com");
  const f: FetchLike = opts.fetch ?? fetch;
  const waitSecs = Math.min(60, Math.max(0, Math.floor(opts.waitSecs ?? 60)));

  async function request(
    method: "GET" | "POST" | "DELETE",
    path: string,
    init?: { query?: Record<string, string | number | boolean>; body?: unknown },
  ): Promise<Response> {
    const url = new URL(baseUrl + path);
    for (const [k, v] of Object.entries(init?.query ?? {})) url.searchParams.set(k, String(v));

    let res: Response;
    try {
      res = await f(url, {
        method,
        headers: {
          accept: "application/json",
          authorization: `Bearer ${token}`,
          ...(init?.body === undefined ? {} : { "content-type": "application/json" }),
        },
        body: init?.body === undefined ? undefined : JSON.stringify(init.body),
      });
    } catch (err) {
      throw new RemoteJobError(`Apify request failed: ${errorMessage(err)}`, { code: "transport_error", cause: err });
    }
    if (!res.ok) throw await readError(res);
    return res;
  }

  async function requestJson<TSchema extends z.ZodTypeAny>(
    method: "GET" | "POST",
    path: string,
    schema: TSchema,
    init?: { query?: Record<string, string | number | boolean>; body?: unknown },
  ): Promise<z.infer<TSchema>> {
    const res = await request(method, path, init);
    const json: unknown = await res.json().catch(() => null);
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new RemoteJobError(`Unexpected Apify response for ${method} ${path}`, {
        status: res.status,
        code: "invalid_response",
      });
    }
    return parsed.data;
  }

  async function waitForRun(run: ApifyRun): Promise<ApifyRun> {
    let current = run;
    while (!TERMINAL_RUN_STATUSES.has(current.status)) {
      const { data } = await requestJson(
        "GET",
        `/v2/actor-runs/${encodeURIComponent(current.id)}`,
        ApifyRunResponseSchema,
        { query: { waitForFinish: waitSecs } },
      );
      current = data;
    }
    return current;
  }

  return {
    baseUrl,

    /** Start an actor run and block until it reaches a terminal status. */
    async runActor(actorId: string, input: unknown): Promise<ApifyRun> {
      const { data } = await requestJson("POST", `/v2/acts/${actorPathId(actorId)}/runs`, ApifyRunResponseSchema, {
        query: { waitForFinish: waitSecs },
        body: input,
      });
      return waitForRun(data);
    },

    async createTask(input: {
      actorId: string;
      name: string;
      input: unknown;
      memoryMbytes?: number;
    }): Promise<ApifyTask> {
      const { data } = await requestJson("POST", "/v2/actor-tasks", ApifyTaskResponseSchema, {
        body: {
          actId: input.actorId,
          name: input.name,
          input: input.input,
          options: { memoryMbytes: input.memoryMbytes ?? 1024 },
        },
      });
      return data;
    },

    async runTask(taskId: string): Promise<ApifyRun> {
      const { data } = await requestJson(
        "POST",
        `/v2/actor-tasks/${encodeURIComponent(taskId)}/runs`,
        ApifyRunResponseSchema,
        { query: { waitForFinish: waitSecs } },
      );
      return waitForRun(data);
    },

    async deleteTask(taskId: string): Promise<void> {
      await request("DELETE", `/v2/actor-tasks/${encodeURIComponent(taskId)}`);
    },

    async listDatasetItems(datasetId: string, input: { limit: number }): Promise<unknown[]> {
      return requestJson("GET", `/v2/datasets/${encodeURIComponent(datasetId)}/items`, ApifyDatasetItemsSchema, {
        query: { clean: true, format: "json", limit: Math.max(1, Math.floor(input.limit)) },
      });
    },
  };
}
