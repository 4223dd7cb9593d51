import client from "prom-client";
import { ModeKind } from "./types/mode";

export class DownloadMetrics {
  readonly registry = new client.Registry();

  private readonly postsDownloaded = new client.Counter({
    name: "booru_fetch_posts_downloaded_total",
    help: "Posts downloaded or found unchanged on disk",
    labelNames: ["mode"] as const,
    registers: [this.registry],
  });

  private readonly postsFailed = new client.Counter({
    name: "booru_fetch_posts_failed_total",
    help: "Posts whose metadata fetch or download failed",
    labelNames: ["mode"] as const,
    registers: [this.registry],
  });

  private readonly pagesFetched = new client.Counter({
    name: "booru_fetch_pages_fetched_total",
    help: "Tag search result pages fetched",
    registers: [this.registry],
  });

  downloaded(mode: ModeKind) {
    this.postsDownloaded.inc({ mode });
  }

  failed(mode: ModeKind) {
    this.postsFailed.inc({ mode });
  }

  pageFetched() {
    this.pagesFetched.inc();
  }

  async render(): Promise<string> {
    return this.registry.metrics();
  }
}
