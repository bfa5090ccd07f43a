import fs from "node:fs/promises";
import path from "node:path";
import type { TranscriptManifest, VideoRecord } from "@tubechat/contracts";
import { errorMessage } from "../errors";
import { logger as rootLogger, type Logger } from "../logger";

export const MAX_TITLE_LENGTH = 50;
export const METADATA_FILE_NAME = "metadata.json";

const ILLEGAL_FILENAME_CHARS = /[<>:"/\\|?*]/g;

/**
 * Strip `< > : " / \ | ? *`, turn spaces into underscores and cut to `maxLength`
 * UTF-16 units (never leaving half a surrogate pair behind).
 */
export function sanitizeFilename(name: string, maxLength = MAX_TITLE_LENGTH): string {
  let out = name.replace(ILLEGAL_FILENAME_CHARS, "").replace(/ /g, "_");
  if (out.length > maxLength) {
    out = out.slice(0, maxLength);
    const last = out.charCodeAt(out.length - 1);
    if (last >= 0xd800 && last <= 0xdbff) out = out.slice(0, -1);
  }
  return out;
}

export function transcriptFileName(record: VideoRecord): string {
  return `${sanitizeFilename(record.title)}_${record.id || "unknown"}.txt`;
}

export function formatCount(n: number): string {
  return String(Math.trunc(n)).replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

export function formatTranscript(record: VideoRecord): string {
  return `# ${record.title}

**URL:** ${record.url}
**Date:** ${record.publishedAt}
**Views:** ${formatCount(record.viewCount)}
**Duration:** ${record.duration}

## Description

${record.description}

## Transcript

${record.transcript}

---
Video ID: ${record.id}
`;
}

export type TranscriptMaterializer = ReturnType<typeof createTranscriptMaterializer>;

export function createTranscriptMaterializer(opts: {
  outputDir: string;
  logger?: Logger;
  /** Manifest timestamp source. */
  now?: () => Date;
}) {
  const outputDir = opts.outputDir;
  const log = (opts.logger ?? rootLogger).child({ component: "materializer" });
  const now = opts.now ?? (() => new Date());

  return {
    outputDir,

    /**
     * Write one file per record that has a transcript. A record that fails to
     * render or write is logged and skipped; the rest still get written.
     */
    async materialize(records: readonly VideoRecord[]): Promise<string[]> {
      await fs.mkdir(outputDir, { recursive: true });
      const paths: string[] = [];

      for (const [i, record] of records.entries()) {
        if (!record.transcript) {
          log.info({ id: record.id, title: record.title }, "No transcript, skipping");
          continue;
        }
        try {
          const filePath = path.join(outputDir, transcriptFileName(record));
          await fs.writeFile(filePath, formatTranscript(record), "utf8");
          paths.push(filePath);
          log.debug({ index: i + 1, total: records.length, file: path.basename(filePath) }, "Wrote transcript");
        } catch (err) {
          log.warn({ id: record.id, title: record.title, err: errorMessage(err) }, "Failed to write transcript");
        }
      }

      log.info({ written: paths.length, records: records.length, outputDir }, "Transcripts materialized");
      return paths;
    },

    /** Overwrites any earlier manifest at the same path. */
    async saveMetadata(records: readonly VideoRecord[], fileName: string = METADATA_FILE_NAME): Promise<string> {
      await fs.mkdir(outputDir, { recursive: true });
      const manifest: TranscriptManifest = {
        totalVideos: records.length,
        processedAt: now().toISOString(),
        videos: [...records],
      };
      const filePath = path.join(outputDir, fileName);
      await fs.writeFile(filePath, JSON.stringify(manifest, null, 2) + "\n", "utf8");
      log.info({ file: filePath, videos: records.length }, "Saved metadata");
      return filePath;
    },

    async listTranscriptFiles(): Promise<string[]> {
      let names: string[];
      try {
        names = await fs.readdir(outputDir);
      } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
        throw err;
      }
      return names
        .filter((name) => name.endsWith(".txt"))
        .sort()
        .map((name) => path.join(outputDir, name));
    },
  };
}
