#!/usr/bin/env tsx
import { Command } from "commander";
import { writeFile } from "node:fs/promises";
import {
  ConfigError,
  DEFAULT_SCRAPE_CONCURRENCY,
  GenerationError,
  InputError,
  PipelineError,
  RemoteJobError,
  applyLogLevel,
  createApifyClient,
  createBatchOrchestrator,
  createContextStore,
  createGeminiClient,
  createMetrics,
  createTranscriptMaterializer,
  createYouTubeScraper,
  errorMessage,
  getTubechatConcurrency,
  getTubechatDefault,
  getTubechatDefaultNumber,
  loadCredentials,
  loadDotEnv,
  logger,
  readUrlListFile,
  type Metrics,
} from "@tubechat/core";
import { runChat } from "./chat.js";
import { formatElapsed, printTable, truncate } from "./format.js";
import { runPipeline } from "./pipeline.js";
import { collectRunOptions, createConsolePrompter, parseMaxVideos, type Prompter } from "./prompts.js";

loadDotEnv();
applyLogLevel();

let activeMetrics: Metrics | null = null;
let interruptMessage = "Process interrupted by user.";

async function flushMetrics(): Promise<void> {
  const file = program.opts<{ metricsFile?: string }>().metricsFile;
  if (!file || !activeMetrics) return;
  try {
    await writeFile(file, await activeMetrics.register.metrics(), "utf8");
  } catch (err) {
    console.error(`warning: could not write metrics to ${file}: ${errorMessage(err)}`);
  }
}

function onInterrupt(): void {
  console.log(`\n\n${interruptMessage}`);
  void flushMetrics().then(() => process.exit(0));
}

function handleErr(err: unknown): never {
  if (err instanceof ConfigError) {
    console.error("error: Missing required environment variables:");
    for (const name of err.missing) console.error(`  - ${name}`);
    console.error("Create a .env file with the required variables (see .env.example).");
    process.exit(1);
  }
  if (err instanceof RemoteJobError) {
    const status = err.status ? ` HTTP ${err.status}` : "";
    const code = err.code ? ` (${err.code})` : "";
    console.error(`error:${status}${code}: ${err.message}`);
    process.exit(1);
  }
  if (err instanceof GenerationError && err.status) {
    console.error(`error: HTTP ${err.status}: ${err.message}`);
    process.exit(1);
  }
  if (err instanceof Error) {
    console.error(`error: ${err.message}`);
    process.exit(1);
  }
  console.error(`error: ${String(err)}`);
  process.exit(1);
}

async function runAction(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    await flushMetrics();
    handleErr(err);
  }
  await flushMetrics();
}

/** Every remote client, built from credentials and the resolved defaults. */
function createRuntime(opts: { outputDir?: string } = {}) {
  const credentials = loadCredentials();
  const metrics = createMetrics();
  activeMetrics = metrics;

  const apify = createApifyClient({
    token: credentials.apifyToken,
    baseUrl: getTubechatDefault("APIFY_BASE_URL"),
  });
  const scraper = createYouTubeScraper({
    apify,
    actorId: getTubechatDefault("TUBECHAT_APIFY_ACTOR"),
    logger,
    metrics,
  });
  const batch = createBatchOrchestrator({
    scraper,
    concurrency: getTubechatConcurrency("TUBECHAT_SCRAPE_CONCURRENCY", DEFAULT_SCRAPE_CONCURRENCY),
    logger,
    metrics,
  });
  const gemini = createGeminiClient({
    apiKey: credentials.geminiApiKey,
    model: getTubechatDefault("TUBECHAT_GEMINI_MODEL"),
    baseUrl: getTubechatDefault("GEMINI_BASE_URL"),
  });
  const contexts = createContextStore({ gemini, logger, metrics });
  const materializer = createTranscriptMaterializer({
    outputDir: opts.outputDir ?? getTubechatDefault("TUBECHAT_TRANSCRIPTS_DIR"),
    logger,
  });

  return { logger, metrics, batch, contexts, materializer, model: gemini.model };
}

function printBanner(p: Prompter): void {
  p.say("");
  p.say("=".repeat(70));
  p.say("tubechat: batch YouTube transcripts, then chat with them");
  p.say("=".repeat(70));
  p.say("Powered by Apify + Google Gemini");
  p.say("");
}

async function chatWith(
  prompter: Prompter,
  contexts: ReturnType<typeof createRuntime>["contexts"],
): Promise<void> {
  interruptMessage = "Chat interrupted. Goodbye!";
  await runChat({ prompter, contexts });
}

const program = new Command();
program
  .name("tubechat")
  .description("Scrape YouTube transcripts, upload them to Gemini and chat against them")
  .option("--json", "Machine-friendly JSON output", false)
  .option("--metrics-file <path>", "Write Prometheus metrics to this file on exit");

program
  .command("run", { isDefault: true })
  .description("Interactive setup: choose sources, scrape, upload, then chat")
  .action(async () => {
    await runAction(async () => {
      const runtime = createRuntime();
      const prompter = createConsolePrompter({ onInterrupt });
      try {
        printBanner(prompter);
        const options = await collectRunOptions(prompter, {
          maxResults: getTubechatDefaultNumber("TUBECHAT_MAX_VIDEOS", 50),
        });

        prompter.say("");
        prompter.say("=".repeat(70));
        prompter.say(`URLs: ${options.urls.length}`);
        prompter.say(`Max videos per URL: ${options.maxResults}`);
        prompter.say(`Using Apify tasks: ${options.useTasks ? "Yes" : "No"}`);
        prompter.say(`Model: ${runtime.model}`);
        prompter.say("=".repeat(70));

        const startedAt = Date.now();
        await runPipeline({ ...runtime, say: (line) => prompter.say(line) }, options);
        prompter.say("");
        prompter.say(`Setup complete in ${formatElapsed(Date.now() - startedAt)}. Ready to chat!`);
        await chatWith(prompter, runtime.contexts);
      } finally {
        prompter.close();
      }
    });
  });

program
  .command("scrape")
  .description("Scrape without prompts, then optionally chat")
  .option("--url <url...>", "YouTube channel, playlist or video URL(s)")
  .option("--file <path>", "File with one URL per line")
  .option("--max <n>", "Max videos per URL")
  .option("--tasks", "Run each URL through a reusable Apify task", false)
  .option("--out <dir>", "Output directory for transcript files")
  .option("--no-chat", "Exit after uploading instead of starting the chat")
  .action(async (cmd: { url?: string[]; file?: string; max?: string; tasks: boolean; out?: string; chat: boolean }) => {
    await runAction(async () => {
      const fallback = getTubechatDefaultNumber("TUBECHAT_MAX_VIDEOS", 50);
      const max = parseMaxVideos(cmd.max ?? "", fallback);
      if (!max.ok) throw new InputError(`--max: ${max.message}`);

      const urls = [...(cmd.url ?? []), ...(cmd.file ? await readUrlListFile(cmd.file) : [])];
      const runtime = createRuntime({ outputDir: cmd.out });
      const say = (line: string) => console.log(line);
      process.once("SIGINT", onInterrupt);

      const result = await runPipeline({ ...runtime, say }, { urls, maxResults: max.value, useTasks: cmd.tasks });
      if (program.opts<{ json: boolean }>().json) {
        console.log(
          JSON.stringify(
            {
              videos: result.videos.length,
              transcriptFiles: result.transcriptFiles,
              metadataFile: result.metadataFile,
              uploaded: result.uploaded,
              failures: result.failures.map((f) => ({ url: f.url, error: f.error.message })),
            },
            null,
            2,
          ),
        );
      }
      if (!cmd.chat) return;

      const prompter = createConsolePrompter({ onInterrupt });
      try {
        await chatWith(prompter, runtime.contexts);
      } finally {
        prompter.close();
      }
    });
  });

program
  .command("chat")
  .description("Upload existing transcript files and chat with them")
  .option("--dir <dir>", "Directory holding transcript .txt files")
  .action(async (cmd: { dir?: string }) => {
    await runAction(async () => {
      const runtime = createRuntime({ outputDir: cmd.dir });
      const files = await runtime.materializer.listTranscriptFiles();
      if (!files.length) {
        throw new PipelineError("no_transcripts", `No transcript files found in ${runtime.materializer.outputDir}`);
      }
      process.once("SIGINT", onInterrupt);
      console.log(`Uploading ${files.length} transcript file(s) from ${runtime.materializer.outputDir}`);
      await runtime.contexts.upload(files);

      const prompter = createConsolePrompter({ onInterrupt });
      try {
        await chatWith(prompter, runtime.contexts);
      } finally {
        prompter.close();
      }
    });
  });

const files = program.command("files").description("Manage files stored on the Gemini Files API");

files
  .command("list")
  .description("List uploaded files")
  .action(async () => {
    await runAction(async () => {
      const runtime = createRuntime();
      const remote = await runtime.contexts.listRemote();
      if (program.opts<{ json: boolean }>().json) {
        console.log(JSON.stringify({ files: remote }, null, 2));
        return;
      }
      if (!remote.length) {
        console.log("No files uploaded.");
        return;
      }
      printTable(
        remote.map((f) => ({
          name: f.name,
          display_name: truncate(f.displayName, 60),
          state: f.state,
        })),
      );
    });
  });

files
  .command("clear")
  .description("Delete every uploaded file")
  .action(async () => {
    await runAction(async () => {
      const runtime = createRuntime();
      const { deleted, failed } = await runtime.contexts.clearRemote();
      console.log(`Deleted ${deleted} file(s)${failed ? `, ${failed} could not be deleted` : ""}`);
    });
  });

program.parseAsync(process.argv).catch(handleErr);
