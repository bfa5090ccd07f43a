import type { UploadedContext, VideoRecord } from "@tubechat/contracts";
import {
  PipelineError,
  classifyYouTubeSource,
  logger as rootLogger,
  resolveSources,
  type BatchFailure,
  type BatchOrchestrator,
  type ContextStore,
  type Logger,
  type TranscriptMaterializer,
} from "@tubechat/core";

export type PipelineDeps = {
  batch: Pick<BatchOrchestrator, "fetchAll">;
  materializer: Pick<TranscriptMaterializer, "materialize" | "saveMetadata">;
  contexts: Pick<ContextStore, "upload">;
  logger?: Logger;
  say?: (line: string) => void;
};

export type PipelineInput = { urls: string[]; maxResults: number; useTasks: boolean };

export type PipelineResult = {
  videos: VideoRecord[];
  failures: BatchFailure[];
  transcriptFiles: string[];
  metadataFile: string;
  uploaded: UploadedContext[];
};

const RULE = "-".repeat(70);

/**
 * scrape -> transcript files -> metadata -> upload. Per-source and per-file failures are
 * tolerated; an empty batch at either of the first two steps is a PipelineError.
 */
export async function runPipeline(deps: PipelineDeps, input: PipelineInput): Promise<PipelineResult> {
  const log = (deps.logger ?? rootLogger).child({ component: "pipeline" });
  const say = deps.say ?? (() => {});

  const urls = resolveSources(input.urls);
  if (!urls.length) throw new PipelineError("no_urls", "No URLs provided.");
  log.info({ urls: urls.length, maxResults: input.maxResults, useTasks: input.useTasks }, "Pipeline started");

  say("");
  say("STEP 1: Scraping YouTube URLs");
  say(RULE);
  for (const url of urls) say(`  [${classifyYouTubeSource(url)}] ${url}`);
  const { videos, failures } = await deps.batch.fetchAll(urls, input.maxResults, input.useTasks);
  say(`Scraped ${videos.length} video(s) from ${urls.length - failures.length}/${urls.length} URL(s)`);
  if (!videos.length) {
    throw new PipelineError("no_videos", "No videos found. Please check the URLs and try again.");
  }

  say("");
  say("STEP 2: Creating transcript files");
  say(RULE);
  const transcriptFiles = await deps.materializer.materialize(videos);
  say(`Created ${transcriptFiles.length} transcript file(s)`);
  if (!transcriptFiles.length) {
    throw new PipelineError("no_transcripts", "No transcripts available. The videos may not have subtitles.");
  }
  const metadataFile = await deps.materializer.saveMetadata(videos);
  say(`Saved metadata to ${metadataFile}`);

  say("");
  say("STEP 3: Uploading files to Gemini");
  say(RULE);
  const uploaded = await deps.contexts.upload(transcriptFiles);
  say(`Uploaded ${uploaded.length}/${transcriptFiles.length} file(s)`);

  log.info(
    { videos: videos.length, failedSources: failures.length, files: transcriptFiles.length, uploaded: uploaded.length },
    "Pipeline complete",
  );
  return { videos, failures, transcriptFiles, metadataFile, uploaded };
}
