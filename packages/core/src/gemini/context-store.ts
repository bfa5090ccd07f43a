import path from "node:path";
import type { ContextState, GeminiFile, GeminiFileState, UploadedContext } from "@tubechat/contracts";
import { GenerationError, UploadError, errorMessage } from "../errors";
import { logger as rootLogger, type Logger } from "../logger";
import type { Metrics } from "../metrics/metrics";
import type { GenerateRequest } from "./client";

/** The slice of the Gemini client the store talks to. */
export interface ContextBackend {
  uploadFile(filePath: string, input?: { displayName?: string; mimeType?: string }): Promise<GeminiFile>;
  getFile(name: string): Promise<GeminiFile>;
  listFiles(): Promise<GeminiFile[]>;
  deleteFile(name: string): Promise<void>;
  generateContent(req: GenerateRequest): Promise<string>;
}

/** Only PROCESSING is polled; ACTIVE and STATE_UNSPECIFIED are both usable. */
export function toContextState(state: GeminiFileState): ContextState {
  if (state === "PROCESSING") return "pending";
  if (state === "FAILED") return "failed";
  return "ready";
}

export function toUploadedContext(file: GeminiFile): UploadedContext {
  return {
    name: file.name,
    displayName: file.displayName,
    uri: file.uri,
    mimeType: file.mimeType,
    state: toContextState(file.state),
  };
}

function sleepMs(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export type ContextStore = ReturnType<typeof createContextStore>;

export function createContextStore(opts: {
  gemini: ContextBackend;
  logger?: Logger;
  metrics?: Metrics;
  pollIntervalMs?: number;
  /** Give up on a file that is still processing after this long. */
  readyTimeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}) {
  const gemini = opts.gemini;
  const log = (opts.logger ?? rootLogger).child({ component: "context" });
  const pollIntervalMs = opts.pollIntervalMs ?? 2000;
  const readyTimeoutMs = opts.readyTimeoutMs ?? 300_000;
  const sleep = opts.sleep ?? sleepMs;
  const now = opts.now ?? Date.now;
  const handles: UploadedContext[] = [];

  async function uploadOne(filePath: string): Promise<UploadedContext> {
    const displayName = path.basename(filePath);
    let file: GeminiFile;
    try {
      file = await gemini.uploadFile(filePath, { displayName, mimeType: "text/plain" });
      const deadline = now() + readyTimeoutMs;
      while (toContextState(file.state) === "pending") {
        if (now() >= deadline) {
          throw new UploadError(`Timed out waiting for ${displayName} to finish processing`, {
            path: filePath,
            state: file.state,
          });
        }
        log.debug({ file: file.name }, "Processing file");
        await sleep(pollIntervalMs);
        file = await gemini.getFile(file.name);
      }
    } catch (err) {
      if (err instanceof UploadError) throw err;
      throw new UploadError(`Upload failed for ${displayName}: ${errorMessage(err)}`, { path: filePath, cause: err });
    }

    if (toContextState(file.state) === "failed") {
      const reason = file.error?.message ? `: ${file.error.message}` : "";
      throw new UploadError(`File processing failed for ${displayName}${reason}`, { path: filePath, state: file.state });
    }
    return toUploadedContext(file);
  }

  return {
    /**
     * Upload one file at a time and wait for each to become ready. A file that fails
     * is logged and left out; the returned list may be shorter than `paths`.
     */
    async upload(paths: readonly string[]): Promise<UploadedContext[]> {
      const ready: UploadedContext[] = [];
      for (const [i, filePath] of paths.entries()) {
        log.info({ index: i + 1, total: paths.length, file: path.basename(filePath) }, "Uploading file");
        try {
          const handle = await uploadOne(filePath);
          ready.push(handle);
          handles.push(handle);
          opts.metrics?.uploadsTotal.inc({ status: "ready" });
        } catch (err) {
          opts.metrics?.uploadsTotal.inc({ status: "failed" });
          log.error({ file: filePath, err: errorMessage(err) }, "Skipping file after upload error");
        }
      }
      log.info({ uploaded: ready.length, total: paths.length }, "Upload complete");
      return ready;
    },

    uploaded(): ReadonlyArray<UploadedContext> {
      return handles;
    },

    /**
     * Answer with every uploaded document attached, or with none when there are
     * none. No ranking or trimming: an oversized context fails at the model.
     */
    async ask(question: string, context?: ReadonlyArray<UploadedContext>): Promise<string> {
      const files = context ?? handles;
      const mode = files.length > 0 ? "grounded" : "ungrounded";
      if (mode === "ungrounded") log.warn("No documents available; answering without context");
      else log.debug({ documents: files.length }, "Querying documents");

      const startedAt = Date.now();
      try {
        const text = await gemini.generateContent({ prompt: question, files: files.length > 0 ? files : undefined });
        opts.metrics?.chatRequestsTotal.inc({ mode, status: "ok" });
        opts.metrics?.chatDurationMs.observe({ mode, status: "ok" }, Date.now() - startedAt);
        return text;
      } catch (err) {
        opts.metrics?.chatRequestsTotal.inc({ mode, status: "error" });
        opts.metrics?.chatDurationMs.observe({ mode, status: "error" }, Date.now() - startedAt);
        if (err instanceof GenerationError) throw err;
        throw new GenerationError(errorMessage(err), { cause: err });
      }
    },

    async listRemote(): Promise<UploadedContext[]> {
      const files = await gemini.listFiles();
      return files.map(toUploadedContext);
    },

    /** Best-effort delete of every remote file; failures are logged and counted. */
    async clearRemote(): Promise<{ deleted: number; failed: number }> {
      const files = await gemini.listFiles();
      let deleted = 0;
      let failed = 0;
      for (const file of files) {
        try {
          await gemini.deleteFile(file.name);
          deleted++;
          log.info({ file: file.name }, "Deleted file");
        } catch (err) {
          failed++;
          log.warn({ file: file.name, err: errorMessage(err) }, "Failed to delete file");
        }
      }
      handles.length = 0;
      return { deleted, failed };
    },
  };
}
