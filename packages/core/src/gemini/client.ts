import fs from "node:fs/promises";
import path from "node:path";
import {
  GeminiErrorSchema,
  GeminiFileSchema,
  GeminiListFilesResponseSchema,
  GeminiUploadResponseSchema,
  GenerateContentResponseSchema,
  type GeminiFile,
  type GenerateContentResponse,
} from "@tubechat/contracts";
import type { z } from "zod";
import { GenerationError, errorMessage } from "../errors";

type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";

export class GeminiApiError extends Error {
  status: number;
  code?: string;

  constructor(message: string, opts: { status: number; code?: string }) {
    super(message);
    this.name = "GeminiApiError";
    this.status = opts.status;
    this.code = opts.code;
  }
}

export type GenerateRequest = {
  prompt: string;
  files?: ReadonlyArray<{ uri: string; mimeType: string }>;
};

function cleanBaseUrl(baseUrl: string): string {
  const trimmed = baseUrl.trim();
  if (!trimmed) throw new Error("baseUrl is required");
  return trimmed.endsWith("/") ? trimmed.slice(0, -1) : trimmed;
}

async function readError(res: Response): Promise<GeminiApiError> {
  const txt = await res.text().catch(() => "");
  try {
    const parsed = GeminiErrorSchema.parse(JSON.parse(txt));
    return new GeminiApiError(`Gemini API error ${res.status}: ${parsed.error.message}`, {
      status: res.status,
      code: parsed.error.status,
    });
  } catch {
    return new GeminiApiError(`Gemini API error ${res.status}: ${txt}`, { status: res.status });
  }
}

export type GeminiClient = ReturnType<typeof createGeminiClient>;

export function createGeminiClient(opts: { apiKey: string; model?: string; baseUrl?: string; fetch?: FetchLike }) {
  const apiKey = opts.apiKey.trim();
  if (!apiKey) throw new Error("Gemini API key is required");
  const model = opts.model || DEFAULT_GEMINI_MODEL;
  const baseUrl = cleanBaseUrl(opts.baseUrl ?? "https://generativelanguage.googleapis.com");
  const f: FetchLike = opts.fetch ?? fetch;

  function endpoint(p: string, query?: Record<string, string | number | undefined>): URL {
    const url = new URL(baseUrl + p);
    url.searchParams.set("key", apiKey);
    for (const [k, v] of Object.entries(query ?? {})) {
      if (v === undefined) continue;
      url.searchParams.set(k, String(v));
    }
    return url;
  }

  async function send(url: string | URL, init: RequestInit): Promise<Response> {
    const res = await f(url, init);
    if (!res.ok) throw await readError(res);
    return res;
  }

  async function readJson<TSchema extends z.ZodTypeAny>(res: Response, schema: TSchema): Promise<z.infer<TSchema>> {
    const json: unknown = await res.json().catch(() => null);
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new GeminiApiError(`Unexpected Gemini response (${res.status})`, { status: res.status, code: "invalid_response" });
    }
    return parsed.data;
  }

  return {
    model,

    /** Resumable upload: a `start` request, then the bytes with `upload, finalize`. */
    async uploadFile(filePath: string, input?: { displayName?: string; mimeType?: string }): Promise<GeminiFile> {
      const content = await fs.readFile(filePath, "utf8");
      const mimeType = input?.mimeType ?? "text/plain";
      const displayName = input?.displayName ?? path.basename(filePath);
      const size = Buffer.byteLength(content, "utf8");

      const start = await send(endpoint("/upload/v1beta/files"), {
        method: "POST",
        headers: {
          "content-type": "application/json",
          "x-goog-upload-protocol": "resumable",
          "x-goog-upload-command": "start",
          "x-goog-upload-header-content-length": String(size),
          "x-goog-upload-header-content-type": mimeType,
        },
        body: JSON.stringify({ file: { display_name: displayName } }),
      });
      const uploadUrl = start.headers.get("x-goog-upload-url");
      if (!uploadUrl) {
        throw new GeminiApiError("Gemini upload did not return an upload URL", { status: start.status });
      }

      const done = await send(uploadUrl, {
        method: "POST",
        headers: {
          "content-type": mimeType,
          "x-goog-upload-offset": "0",
          "x-goog-upload-command": "upload, finalize",
        },
        body: content,
      });
      const { file } = await readJson(done, GeminiUploadResponseSchema);
      return file;
    },

    async getFile(name: string): Promise<GeminiFile> {
      const res = await send(endpoint(`/v1beta/${name}`), { method: "GET" });
      return readJson(res, GeminiFileSchema);
    },

    async listFiles(): Promise<GeminiFile[]> {
      const out: GeminiFile[] = [];
      let pageToken: string | undefined;
      do {
        const res = await send(endpoint("/v1beta/files", { pageSize: 100, pageToken }), { method: "GET" });
        const page = await readJson(res, GeminiListFilesResponseSchema);
        out.push(...page.files);
        pageToken = page.nextPageToken || undefined;
      } while (pageToken);
      return out;
    },

    async deleteFile(name: string): Promise<void> {
      await send(endpoint(`/v1beta/${name}`), { method: "DELETE" });
    },

    /** Single-turn generation; every file is attached after the prompt text. */
    async generateContent(req: GenerateRequest): Promise<string> {
      const parts = [
        { text: req.prompt },
        ...(req.files ?? []).map((file) => ({ file_data: { mime_type: file.mimeType, file_uri: file.uri } })),
      ];

      let body: GenerateContentResponse;
      try {
        const res = await send(endpoint(`/v1beta/models/${model}:generateContent`), {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify({ contents: [{ role: "user", parts }] }),
        });
        body = await readJson(res, GenerateContentResponseSchema);
      } catch (err) {
        const status = err instanceof GeminiApiError ? err.status : undefined;
        throw new GenerationError(errorMessage(err), { status, cause: err });
      }

      const blockReason = body.promptFeedback?.blockReason;
      if (body.candidates.length === 0 && blockReason) {
        throw new GenerationError(`Prompt blocked by Gemini: ${blockReason}`);
      }
      const answerParts = body.candidates[0]?.content?.parts ?? [];
      return answerParts.map((p) => p.text ?? "").join("");
    },
  };
}
