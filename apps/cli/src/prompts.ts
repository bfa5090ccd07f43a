import { createInterface } from "node:readline";
import { InputError, normalizeSourceUrl, readUrlListFile, resolveSources } from "@tubechat/core";

/** Line-oriented console I/O; tests drive it with a scripted stand-in. */
export interface Prompter {
  ask(question: string): Promise<string>;
  say(line?: string): void;
  close(): void;
}

export function createConsolePrompter(opts: { onInterrupt: () => void }): Prompter {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closing = false;

  // Ctrl+C while a prompt is open arrives here, not as a process signal.
  rl.on("SIGINT", opts.onInterrupt);
  // Ctrl+D
  rl.on("close", () => {
    if (!closing) opts.onInterrupt();
  });

  return {
    ask(question) {
      return new Promise<string>((resolve) => {
        rl.question(question, (answer) => resolve(answer.trim()));
      });
    },
    say(line = "") {
      console.log(line);
    },
    close() {
      closing = true;
      rl.close();
    },
  };
}

export type Parsed<T> = { ok: true; value: T } | { ok: false; message: string };

export type InputMode = "manual" | "file" | "single";

const INPUT_MODES: Record<string, InputMode> = { "1": "manual", "2": "file", "3": "single" };

export function parseInputMode(raw: string): Parsed<InputMode> {
  const mode = INPUT_MODES[raw.trim()];
  return mode ? { ok: true, value: mode } : { ok: false, message: "Please select 1, 2, or 3." };
}

export function parseMaxVideos(raw: string, fallback: number): Parsed<number> {
  const trimmed = raw.trim();
  if (!trimmed) return { ok: true, value: fallback };
  if (!/^[+-]?\d+$/.test(trimmed)) return { ok: false, message: "Please enter a valid number." };
  const n = Number(trimmed);
  if (n <= 0) return { ok: false, message: "Please enter a positive number." };
  return { ok: true, value: n };
}

export function parseYesNo(raw: string): boolean {
  const answer = raw.trim().toLowerCase();
  return answer === "y" || answer === "yes";
}

async function askUntil<T>(p: Prompter, question: string, parse: (raw: string) => Parsed<T>): Promise<T> {
  for (;;) {
    const parsed = parse(await p.ask(question));
    if (parsed.ok) return parsed.value;
    p.say(`  ${parsed.message}`);
  }
}

export function promptInputMode(p: Prompter): Promise<InputMode> {
  p.say("How would you like to provide YouTube URLs?");
  p.say("  1. Enter URLs manually (one at a time)");
  p.say("  2. Load URLs from a file");
  p.say("  3. Single channel/playlist");
  p.say();
  return askUntil(p, "Select mode [1-3]: ", parseInputMode);
}

export async function promptManualUrls(p: Prompter): Promise<string[]> {
  p.say();
  p.say("Enter YouTube URLs (channels, playlists, or videos)");
  p.say("  Press Enter on an empty line when done");
  p.say();

  const urls: string[] = [];
  for (;;) {
    const raw = await p.ask(`URL ${urls.length + 1} (or Enter to finish): `);
    if (!raw) {
      if (urls.length) return urls;
      p.say("  Please enter at least one URL.");
      continue;
    }
    const url = normalizeSourceUrl(raw);
    if (!url) {
      p.say("  Please provide a valid YouTube URL.");
      continue;
    }
    urls.push(url);
    p.say(`  Added: ${url}`);
  }
}

export async function promptUrlFile(p: Prompter): Promise<string[]> {
  p.say();
  p.say("Enter the path to your URLs file");
  p.say("  One URL per line; lines starting with # are ignored");
  p.say();

  for (;;) {
    const filePath = await p.ask("File path: ");
    if (!filePath) {
      p.say("  Please enter a file path.");
      continue;
    }
    try {
      const urls = resolveSources(await readUrlListFile(filePath));
      if (!urls.length) {
        p.say(`  No URLs found in ${filePath}.`);
        continue;
      }
      p.say(`Loaded ${urls.length} URL(s) from file`);
      return urls;
    } catch (err) {
      if (!(err instanceof InputError)) throw err;
      p.say(`  ${err.message}`);
    }
  }
}

export async function promptSingleUrl(p: Prompter): Promise<string[]> {
  p.say();
  p.say("Enter the YouTube channel or playlist URL");
  p.say("  e.g. https://www.youtube.com/@ChannelName");
  p.say();

  for (;;) {
    const raw = await p.ask("URL: ");
    if (!raw) {
      p.say("  URL cannot be empty. Please try again.");
      continue;
    }
    const url = normalizeSourceUrl(raw);
    if (url) return [url];
    p.say("  Please provide a valid YouTube URL.");
  }
}

export function promptMaxVideos(p: Prompter, fallback: number): Promise<number> {
  p.say();
  p.say("Maximum videos to scrape per URL?");
  p.say(`  (Press Enter for default: ${fallback})`);
  p.say();
  return askUntil(p, `Max videos [${fallback}]: `, (raw) => parseMaxVideos(raw, fallback));
}

export async function promptUseTasks(p: Prompter): Promise<boolean> {
  p.say();
  p.say("Use Apify tasks for reusable inputs?");
  p.say("  Recommended if you plan to run the same URLs multiple times");
  p.say();
  return parseYesNo(await p.ask("Use tasks? [y/N]: "));
}

export type RunOptions = { urls: string[]; maxResults: number; useTasks: boolean };

export async function collectRunOptions(p: Prompter, defaults: { maxResults: number }): Promise<RunOptions> {
  const mode = await promptInputMode(p);
  const urls =
    mode === "manual" ? await promptManualUrls(p) : mode === "file" ? await promptUrlFile(p) : await promptSingleUrl(p);
  const maxResults = await promptMaxVideos(p, defaults.maxResults);
  const useTasks = await promptUseTasks(p);
  return { urls, maxResults, useTasks };
}
