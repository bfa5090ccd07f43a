export * from "./config/defaults";
export * from "./config/env";
export * from "./errors";
export * from "./logger";
export * from "./metrics/metrics";
export * from "./youtube";
export * from "./util/concurrency";
export * from "./scrape/apify";
export * from "./scrape/scraper";
export * from "./scrape/batch";
export * from "./transcripts/materialize";
export * from "./gemini/client";
export * from "./gemini/context-store";
export * from "./chat/session";
