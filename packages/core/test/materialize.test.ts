import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { TranscriptManifestSchema } from "@tubechat/contracts";
import {
  createTranscriptMaterializer,
  formatCount,
  formatTranscript,
  sanitizeFilename,
  transcriptFileName,
} from "../src/transcripts/materialize";
import { PINO_WARN, captureLogger, makeVideo, silentLogger } from "./helpers";

async function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "tubechat-out-"));
}

// ─── file names ──────────────────────────────────────────────────────────────

test("sanitizeFilename strips reserved characters and underscores spaces", () => {
  assert.equal(sanitizeFilename('What is <AI>? A "deep" dive: part 1/2'), "What_is_AI_A_deep_dive_part_12");
  assert.equal(sanitizeFilename("a\\b|c*d"), "abcd");
});

test("sanitizeFilename caps the length", () => {
  assert.equal(sanitizeFilename("x".repeat(80)).length, 50);
  assert.equal(sanitizeFilename("x".repeat(49) + "😀"), "x".repeat(49));
});

test("transcriptFileName falls back to 'unknown' for a missing id", () => {
  assert.equal(transcriptFileName(makeVideo({ title: "Hello World", id: "abc" })), "Hello_World_abc.txt");
  assert.equal(transcriptFileName(makeVideo({ title: "Hello", id: "" })), "Hello_unknown.txt");
});

// ─── rendering ───────────────────────────────────────────────────────────────

test("formatCount groups thousands", () => {
  assert.equal(formatCount(0), "0");
  assert.equal(formatCount(999), "999");
  assert.equal(formatCount(1234567), "1,234,567");
});

test("formatTranscript renders the document template", () => {
  const text = formatTranscript(
    makeVideo({
      id: "abc",
      title: "Talk",
      url: "https://www.youtube.com/watch?v=abc",
      publishedAt: "2024-06-15",
      viewCount: 1500,
      duration: "12:34",
      description: "About things",
      transcript: "Words words",
    }),
  );
  assert.equal(
    text,
    [
      "# Talk",
      "",
      "**URL:** https://www.youtube.com/watch?v=abc",
      "**Date:** 2024-06-15",
      "**Views:** 1,500",
      "**Duration:** 12:34",
      "",
      "## Description",
      "",
      "About things",
      "",
      "## Transcript",
      "",
      "Words words",
      "",
      "---",
      "Video ID: abc",
      "",
    ].join("\n"),
  );
});

// ─── materializer ────────────────────────────────────────────────────────────

test("materialize writes a file per record with a transcript", async () => {
  const dir = await tempDir();
  const out = createTranscriptMaterializer({ outputDir: path.join(dir, "nested"), logger: silentLogger });
  const records = [
    makeVideo({ id: "v1", title: "First" }),
    makeVideo({ id: "v2", title: "Second", transcript: "" }),
    makeVideo({ id: "v3", title: "Third" }),
  ];

  const paths = await out.materialize(records);

  assert.deepEqual(
    paths.map((p) => path.basename(p)),
    ["First_v1.txt", "Third_v3.txt"],
  );
  assert.equal(await fs.readFile(paths[0], "utf8"), formatTranscript(records[0]));
  assert.deepEqual(
    (await out.listTranscriptFiles()).map((p) => path.basename(p)),
    ["First_v1.txt", "Third_v3.txt"],
  );
  await fs.rm(dir, { recursive: true, force: true });
});

test("materialize logs and skips a record whose file cannot be written", async () => {
  const dir = await tempDir();
  const { logger, lines } = captureLogger();
  const out = createTranscriptMaterializer({ outputDir: dir, logger });
  const records = [
    makeVideo({ id: "v1", title: "First" }),
    makeVideo({ id: "x/y", title: "Bad" }),
    makeVideo({ id: "v3", title: "Third" }),
  ];

  const paths = await out.materialize(records);

  assert.deepEqual(
    paths.map((p) => path.basename(p)),
    ["First_v1.txt", "Third_v3.txt"],
  );
  const warnings = lines.filter((line) => line.level === PINO_WARN);
  assert.equal(warnings.length, 1);
  assert.equal(warnings[0].msg, "Failed to write transcript");
  assert.equal(warnings[0].id, "x/y");
  await fs.rm(dir, { recursive: true, force: true });
});

test("saveMetadata lists every record, with or without a transcript", async () => {
  const dir = await tempDir();
  const out = createTranscriptMaterializer({
    outputDir: dir,
    logger: silentLogger,
    now: () => new Date("2024-07-01T12:00:00.000Z"),
  });
  const records = [makeVideo({ id: "v1" }), makeVideo({ id: "v2", transcript: "" })];

  const file = await out.saveMetadata(records);
  const first = await fs.readFile(file, "utf8");
  const manifest = TranscriptManifestSchema.parse(JSON.parse(first));

  assert.equal(path.basename(file), "metadata.json");
  assert.equal(manifest.totalVideos, 2);
  assert.equal(manifest.processedAt, "2024-07-01T12:00:00.000Z");
  assert.deepEqual(manifest.videos, records);

  await out.saveMetadata(records);
  assert.equal(await fs.readFile(file, "utf8"), first);
  await fs.rm(dir, { recursive: true, force: true });
});

test("re-running materialize overwrites files with identical content", async () => {
  const dir = await tempDir();
  const out = createTranscriptMaterializer({ outputDir: dir, logger: silentLogger });
  const records = [makeVideo({ id: "v1", title: "Same" })];

  const [first] = await out.materialize(records);
  const before = await fs.readFile(first, "utf8");
  const [second] = await out.materialize(records);

  assert.equal(second, first);
  assert.equal(await fs.readFile(second, "utf8"), before);
  await fs.rm(dir, { recursive: true, force: true });
});

test("listTranscriptFiles is empty for a missing directory", async () => {
  const dir = await tempDir();
  const out = createTranscriptMaterializer({ outputDir: path.join(dir, "missing"), logger: silentLogger });
  assert.deepEqual(await out.listTranscriptFiles(), []);
  await fs.rm(dir, { recursive: true, force: true });
});
