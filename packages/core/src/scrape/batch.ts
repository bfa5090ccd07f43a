import type { VideoRecord } from "@tubechat/contracts";
import { errorMessage } from "../errors";
import { logger as rootLogger, type Logger } from "../logger";
import type { Metrics } from "../metrics/metrics";
import { mapSettled } from "../util/concurrency";
import type { YouTubeScrapeClient } from "./scraper";

export type BatchFailure = { url: string; error: Error };

export type BatchResult = {
  /** Every successful source's records, newest first by `publishedAt`. */
  videos: VideoRecord[];
  /** Sources that failed; logged, never merged into `videos`. */
  failures: BatchFailure[];
};

export const DEFAULT_SCRAPE_CONCURRENCY = 4;

/**
 * Descending by `publishedAt` using plain string comparison. Not date-aware:
 * formats that don't sort lexicographically come out in raw string order.
 * Stable, so equal keys keep their merge order.
 */
export function sortByPublishedDesc(records: readonly VideoRecord[]): VideoRecord[] {
  return [...records].sort((a, b) => {
    if (a.publishedAt === b.publishedAt) return 0;
    return a.publishedAt < b.publishedAt ? 1 : -1;
  });
}

export function scrapeTaskName(url: string, index: number, runStamp: string): string {
  const last = url.split("/").pop() ?? "";
  const slug =
    last
      .toLowerCase()
      .replace(/[^a-z0-9-]+/g, "-")
      .replace(/-+/g, "-")
      .replace(/^-|-$/g, "")
      .slice(0, 20)
      .replace(/-$/, "") || "source";
  return `yt-scrape-${runStamp}-${index}-${slug}`;
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

export type BatchOrchestrator = ReturnType<typeof createBatchOrchestrator>;

export function createBatchOrchestrator(opts: {
  scraper: YouTubeScrapeClient;
  /** Max scrapes in flight. `Infinity` launches one per URL at once. */
  concurrency?: number;
  logger?: Logger;
  metrics?: Metrics;
  /** Distinguishes this run's task names from leftovers of earlier runs. */
  runStamp?: () => string;
}) {
  const scraper = opts.scraper;
  const concurrency = opts.concurrency ?? DEFAULT_SCRAPE_CONCURRENCY;
  const log = (opts.logger ?? rootLogger).child({ component: "batch" });
  const runStamp = opts.runStamp ?? (() => Date.now().toString(36));

  async function releaseTask(taskId: string): Promise<void> {
    try {
      await scraper.deleteTask(taskId);
      log.debug({ taskId }, "Deleted scrape task");
    } catch (err) {
      log.warn({ taskId, err: errorMessage(err) }, "Failed to delete scrape task");
    }
  }

  async function withScrapeTask<T>(
    url: string,
    maxResults: number,
    name: string,
    use: (taskId: string) => Promise<T>,
  ): Promise<T> {
    const taskId = await scraper.createTask(url, maxResults, name);
    try {
      return await use(taskId);
    } finally {
      await releaseTask(taskId);
    }
  }

  return {
    concurrency,

    async fetchAll(urls: readonly string[], maxResultsPerUrl: number, useReusableTasks: boolean): Promise<BatchResult> {
      const mode = useReusableTasks ? "task" : "run";
      const stamp = runStamp();
      log.info({ sources: urls.length, maxResultsPerUrl, mode, concurrency }, "Starting batch scrape");

      const settled = await mapSettled(urls, concurrency, (url, i) =>
        useReusableTasks
          ? withScrapeTask(url, maxResultsPerUrl, scrapeTaskName(url, i, stamp), (taskId) =>
              scraper.runTask(taskId, maxResultsPerUrl, url),
            )
          : scraper.fetch(url, maxResultsPerUrl),
      );

      const merged: VideoRecord[] = [];
      const failures: BatchFailure[] = [];
      settled.forEach((outcome, i) => {
        const url = urls[i];
        if (outcome.status === "rejected") {
          const error = toError(outcome.reason);
          failures.push({ url, error });
          opts.metrics?.scrapeSourcesTotal.inc({ mode, status: "failed" });
          log.error({ url, err: error.message }, "Scrape failed for source");
          return;
        }
        merged.push(...outcome.value);
        opts.metrics?.scrapeSourcesTotal.inc({ mode, status: "succeeded" });
        log.info({ url, videos: outcome.value.length }, "Scraped source");
      });

      const videos = sortByPublishedDesc(merged);
      log.info({ videos: videos.length, failed: failures.length }, "Batch scrape complete");
      return { videos, failures };
    },
  };
}
