import client from "prom-client";

export type Metrics = {
  register: client.Registry;
  scrapeSourcesTotal: client.Counter<"mode" | "status">;
  scrapeVideosTotal: client.Counter<string>;
  uploadsTotal: client.Counter<"status">;
  chatRequestsTotal: client.Counter<"mode" | "status">;
  chatDurationMs: client.Histogram<"mode" | "status">;
};

// One registry per process, created by the entry point and handed to each component.
export function createMetrics(): Metrics {
  const register = new client.Registry();

  const scrapeSourcesTotal = new client.Counter({
    name: "tubechat_scrape_sources_total",
    help: "Source URLs scraped",
    labelNames: ["mode", "status"] as const,
    registers: [register],
  });

  const scrapeVideosTotal = new client.Counter({
    name: "tubechat_scrape_videos_total",
    help: "Video records returned by the scraper",
    registers: [register],
  });

  const uploadsTotal = new client.Counter({
    name: "tubechat_uploads_total",
    help: "Transcript uploads to the context store",
    labelNames: ["status"] as const,
    registers: [register],
  });

  const chatRequestsTotal = new client.Counter({
    name: "tubechat_chat_requests_total",
    help: "Chat generation requests",
    labelNames: ["mode", "status"] as const,
    registers: [register],
  });

  const chatDurationMs = new client.Histogram({
    name: "tubechat_chat_duration_ms",
    help: "Chat generation duration in ms",
    labelNames: ["mode", "status"] as const,
    buckets: [250, 500, 1_000, 2_500, 5_000, 10_000, 20_000, 40_000, 60_000, 120_000],
    registers: [register],
  });

  return { register, scrapeSourcesTotal, scrapeVideosTotal, uploadsTotal, chatRequestsTotal, chatDurationMs };
}
