import test from "node:test";
import assert from "node:assert/strict";
import type { GeminiFile, GeminiFileState } from "@tubechat/contracts";
import { GenerationError } from "../src/errors";
import type { GenerateRequest } from "../src/gemini/client";
import { createContextStore, toContextState, type ContextBackend } from "../src/gemini/context-store";
import { createMetrics } from "../src/metrics/metrics";
import { PINO_ERROR, PINO_WARN, captureLogger, silentLogger } from "./helpers";

function geminiFile(name: string, state: GeminiFileState): GeminiFile {
  return { name, displayName: name, mimeType: "text/plain", uri: `https://files.test/${name}`, state };
}

type FakeBackend = ContextBackend & { requests: GenerateRequest[]; deleted: string[] };

/** `states` lists what getFile reports for each path, in order, after the initial upload. */
function fakeBackend(opts: {
  states?: Record<string, GeminiFileState[]>;
  failUpload?: string[];
  remote?: GeminiFile[];
  failDelete?: string[];
  answer?: string;
}): FakeBackend {
  const pending = new Map<string, GeminiFileState[]>();
  const backend: FakeBackend = {
    requests: [],
    deleted: [],
    async uploadFile(filePath, input) {
      if (opts.failUpload?.includes(filePath)) throw new Error("quota exceeded");
      const name = `files/${input?.displayName ?? filePath}`;
      const states = [...(opts.states?.[filePath] ?? [])];
      const first = states.shift() ?? "ACTIVE";
      pending.set(name, states);
      return geminiFile(name, first);
    },
    async getFile(name) {
      const next = pending.get(name)?.shift() ?? "ACTIVE";
      return geminiFile(name, next);
    },
    async listFiles() {
      return opts.remote ?? [];
    },
    async deleteFile(name) {
      if (opts.failDelete?.includes(name)) throw new Error("forbidden");
      backend.deleted.push(name);
    },
    async generateContent(req) {
      backend.requests.push(req);
      return opts.answer ?? "answer";
    },
  };
  return backend;
}

const noSleep = async () => {};

test("toContextState maps remote states", () => {
  assert.equal(toContextState("ACTIVE"), "ready");
  assert.equal(toContextState("FAILED"), "failed");
  assert.equal(toContextState("PROCESSING"), "pending");
  assert.equal(toContextState("STATE_UNSPECIFIED"), "ready");
});

test("upload waits for processing and keeps only ready files", async () => {
  const backend = fakeBackend({
    states: { "/t/a.txt": ["PROCESSING", "PROCESSING", "ACTIVE"] },
    failUpload: ["/t/b.txt"],
  });
  const { logger, lines } = captureLogger();
  const sleeps: number[] = [];
  const store = createContextStore({
    gemini: backend,
    logger,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });

  const handles = await store.upload(["/t/a.txt", "/t/b.txt", "/t/c.txt"]);

  assert.deepEqual(
    handles.map((h) => h.name),
    ["files/a.txt", "files/c.txt"],
  );
  assert.ok(handles.every((h) => h.state === "ready"));
  assert.deepEqual(sleeps, [2000, 2000]);
  assert.equal(store.uploaded().length, 2);

  const errors = lines.filter((l) => l.level === PINO_ERROR);
  assert.equal(errors.length, 1);
  assert.equal(errors[0].file, "/t/b.txt");
  assert.equal(errors[0].err, "Upload failed for b.txt: quota exceeded");
});

test("polling stops once a file leaves PROCESSING, even without a definite state", async () => {
  const backend = fakeBackend({ states: { "/t/a.txt": ["PROCESSING", "STATE_UNSPECIFIED", "PROCESSING"] } });
  const sleeps: number[] = [];
  const store = createContextStore({
    gemini: backend,
    logger: silentLogger,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });

  const handles = await store.upload(["/t/a.txt"]);

  assert.deepEqual(
    handles.map((h) => [h.name, h.state]),
    [["files/a.txt", "ready"]],
  );
  assert.deepEqual(sleeps, [2000]);
});

test("a file that fails processing is left out", async () => {
  const backend = fakeBackend({ states: { "/t/a.txt": ["PROCESSING", "FAILED"] } });
  const store = createContextStore({ gemini: backend, logger: silentLogger, sleep: noSleep });
  assert.deepEqual(await store.upload(["/t/a.txt"]), []);
});

test("a file still processing past the deadline is left out", async () => {
  const backend = fakeBackend({ states: { "/t/a.txt": ["PROCESSING", "PROCESSING", "PROCESSING", "PROCESSING"] } });
  let clock = 0;
  const { logger, lines } = captureLogger();
  const store = createContextStore({
    gemini: backend,
    logger,
    readyTimeoutMs: 5000,
    sleep: async (ms) => {
      clock += ms;
    },
    now: () => clock,
  });

  assert.deepEqual(await store.upload(["/t/a.txt"]), []);
  const errors = lines.filter((l) => l.level === PINO_ERROR);
  assert.equal(errors[0].err, "Timed out waiting for a.txt to finish processing");
});

test("upload counts outcomes in metrics", async () => {
  const metrics = createMetrics();
  const backend = fakeBackend({ failUpload: ["/t/b.txt"] });
  const store = createContextStore({ gemini: backend, logger: silentLogger, metrics, sleep: noSleep });

  await store.upload(["/t/a.txt", "/t/b.txt"]);

  const snapshot = await metrics.uploadsTotal.get();
  const byStatus = Object.fromEntries(snapshot.values.map((v) => [String(v.labels.status), v.value]));
  assert.deepEqual(byStatus, { ready: 1, failed: 1 });
});

test("ask attaches every uploaded document", async () => {
  const backend = fakeBackend({ answer: "grounded answer" });
  const store = createContextStore({ gemini: backend, logger: silentLogger, sleep: noSleep });
  await store.upload(["/t/a.txt", "/t/b.txt"]);

  const answer = await store.ask("What happened?");

  assert.equal(answer, "grounded answer");
  assert.equal(backend.requests[0].prompt, "What happened?");
  assert.deepEqual(
    backend.requests[0].files?.map((f) => f.uri),
    ["https://files.test/files/a.txt", "https://files.test/files/b.txt"],
  );
});

test("ask with no documents answers ungrounded and warns", async () => {
  const backend = fakeBackend({ answer: "plain answer" });
  const { logger, lines } = captureLogger();
  const store = createContextStore({ gemini: backend, logger, sleep: noSleep });

  const answer = await store.ask("Hi?");

  assert.equal(answer, "plain answer");
  assert.equal(backend.requests[0].files, undefined);
  assert.equal(lines.filter((l) => l.level === PINO_WARN).length, 1);
});

test("ask wraps unexpected failures as GenerationError", async () => {
  const backend = fakeBackend({});
  backend.generateContent = async () => {
    throw new Error("socket hang up");
  };
  const store = createContextStore({ gemini: backend, logger: silentLogger, sleep: noSleep });

  await assert.rejects(store.ask("q"), (err: unknown) => {
    return err instanceof GenerationError && err.message === "socket hang up";
  });
});

test("clearRemote deletes what it can and forgets local handles", async () => {
  const backend = fakeBackend({
    remote: [geminiFile("files/x", "ACTIVE"), geminiFile("files/y", "ACTIVE"), geminiFile("files/z", "FAILED")],
    failDelete: ["files/y"],
  });
  const store = createContextStore({ gemini: backend, logger: silentLogger, sleep: noSleep });
  await store.upload(["/t/a.txt"]);

  const result = await store.clearRemote();

  assert.deepEqual(result, { deleted: 2, failed: 1 });
  assert.deepEqual(backend.deleted, ["files/x", "files/z"]);
  assert.equal(store.uploaded().length, 0);
});

test("listRemote maps remote files to context handles", async () => {
  const backend = fakeBackend({ remote: [geminiFile("files/x", "PROCESSING")] });
  const store = createContextStore({ gemini: backend, logger: silentLogger });
  assert.deepEqual(await store.listRemote(), [
    { name: "files/x", displayName: "files/x", uri: "https://files.test/files/x", mimeType: "text/plain", state: "pending" },
  ]);
});
