import {
  ScrapedVideoItemSchema,
  type ApifyRun,
  type ScrapeInput,
  type SubtitleTrack,
  type VideoRecord,
} from "@tubechat/contracts";
import { RemoteJobError, errorMessage } from "../errors";
import { logger as rootLogger, type Logger } from "../logger";
import type { Metrics } from "../metrics/metrics";
import type { ApifyClient } from "./apify";

export const DEFAULT_ACTOR_ID = "streamers/youtube-scraper";
export const SUBTITLES_LANGUAGE = "en";

/** One remote scrape per call; no retries. */
export interface YouTubeScrapeClient {
  fetch(url: string, maxResults: number): Promise<VideoRecord[]>;
  createTask(url: string, maxResults: number, name: string): Promise<string>;
  /** `url` is the source the task was created for; errors carry it. */
  runTask(taskId: string, maxResults: number, url: string): Promise<VideoRecord[]>;
  deleteTask(taskId: string): Promise<void>;
}

export function buildScrapeInput(url: string, maxResults: number): ScrapeInput {
  return {
    startUrls: [{ url }],
    maxResults,
    getSubtitles: true,
    subtitlesLanguage: SUBTITLES_LANGUAGE,
    subtitlesFormat: "plaintext",
  };
}

function trackText(track: SubtitleTrack): string {
  return (track.plaintext ?? track.srt ?? track.vtt ?? track.xml ?? "").trim();
}

// The actor returns either a ready string or one entry per subtitle track.
function pickTranscript(subtitles: string | SubtitleTrack[] | null): string {
  if (subtitles === null) return "";
  if (typeof subtitles === "string") return subtitles;
  const english = subtitles.find(
    (t) => (t.language ?? "").toLowerCase().startsWith(SUBTITLES_LANGUAGE) && trackText(t),
  );
  const chosen = english ?? subtitles.find((t) => trackText(t));
  return chosen ? trackText(chosen) : "";
}

export function toVideoRecord(raw: unknown): VideoRecord {
  const item = ScrapedVideoItemSchema.parse(typeof raw === "object" && raw !== null ? raw : {});
  return {
    id: item.id,
    title: item.title,
    url: item.url,
    description: item.description,
    publishedAt: item.date,
    transcript: pickTranscript(item.subtitles),
    viewCount: item.viewCount,
    duration: item.duration,
  };
}

export function createYouTubeScraper(opts: {
  apify: ApifyClient;
  actorId?: string;
  memoryMbytes?: number;
  logger?: Logger;
  metrics?: Metrics;
}): YouTubeScrapeClient {
  const actorId = opts.actorId ?? DEFAULT_ACTOR_ID;
  const log = (opts.logger ?? rootLogger).child({ component: "scraper" });

  async function collect(run: ApifyRun, maxResults: number, label: string): Promise<VideoRecord[]> {
    if (run.status !== "SUCCEEDED") {
      const detail = run.statusMessage ? `: ${run.statusMessage}` : "";
      throw new RemoteJobError(`Scrape run ${run.id} finished with status ${run.status}${detail}`, {
        code: run.status.toLowerCase(),
        url: label,
      });
    }
    const items = await opts.apify.listDatasetItems(run.defaultDatasetId, { limit: maxResults });
    const videos = items.slice(0, maxResults).map(toVideoRecord);
    const withTranscript = videos.filter((v) => v.transcript).length;
    log.debug({ source: label, runId: run.id, items: videos.length, withTranscript }, "Scrape run collected");
    opts.metrics?.scrapeVideosTotal.inc(videos.length);
    return videos;
  }

  function wrap(err: unknown, url: string): RemoteJobError {
    if (err instanceof RemoteJobError) {
      if (!err.url) err.url = url;
      return err;
    }
    return new RemoteJobError(errorMessage(err), { url, cause: err });
  }

  return {
    async fetch(url, maxResults) {
      log.info({ url, maxResults }, "Scraping source");
      try {
        const run = await opts.apify.runActor(actorId, buildScrapeInput(url, maxResults));
        return await collect(run, maxResults, url);
      } catch (err) {
        throw wrap(err, url);
      }
    },

    async createTask(url, maxResults, name) {
      try {
        const task = await opts.apify.createTask({
          actorId,
          name,
          input: buildScrapeInput(url, maxResults),
          memoryMbytes: opts.memoryMbytes,
        });
        log.info({ url, taskId: task.id, name }, "Created scrape task");
        return task.id;
      } catch (err) {
        throw wrap(err, url);
      }
    },

    async runTask(taskId, maxResults, url) {
      log.info({ url, taskId, maxResults }, "Running scrape task");
      try {
        const run = await opts.apify.runTask(taskId);
        return await collect(run, maxResults, url);
      } catch (err) {
        throw wrap(err, url);
      }
    },

    async deleteTask(taskId) {
      await opts.apify.deleteTask(taskId);
    },
  };
}
