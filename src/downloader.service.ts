import path from "path";
import { DanbooruApiService } from "./danbooru-api.service";
import { DownloadMetrics } from "./download-metrics";
import { DownloadablePost } from "./types/danbooru";
import { Logger } from "./types/logger";
import { Mode, ModeKind, PoolNaming } from "./types/mode";
import { BatchReport, emptyReport, ItemId, ItemResult } from "./types/result";
import { isRecord, toDownloadablePost } from "./utils/decode";
import { md5Filename, sequenceFilename } from "./utils/filename";
import { pageNumbers, pageQuery, tagQuery } from "./utils/pagination";

export interface DownloaderConfig {
  outputDir: string;
}

const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

export class DownloaderService {
  constructor(
    private readonly api: DanbooruApiService,
    private readonly config: DownloaderConfig,
    private readonly logger: Logger,
    private readonly metrics: DownloadMetrics,
  ) {}

  run(mode: Mode): Promise<BatchReport> {
    switch (mode.kind) {
      case "post":
        return this.downloadPosts(mode.ids);
      case "pool":
        return this.downloadPool(mode.id, mode.naming);
      case "tags":
        return this.downloadTags(mode.tags);
      default: {
        const unhandled: never = mode;
        throw new Error(`unrecognized mode ${JSON.stringify(unhandled)}`);
      }
    }
  }

  async downloadPosts(ids: number[]): Promise<BatchReport> {
    const report = emptyReport();

    for (const id of ids) {
      const result = await this.attempt(id, async () => {
        const post = await this.api.fetchPost(id);
        return this.save(post, md5Filename(post, 0));
      });
      this.record("post", result, report);
    }

    return report;
  }

  async downloadPool(id: number, naming: PoolNaming): Promise<BatchReport> {
    this.logger.log(`pool ${id}`);

    const pool = await this.api.fetchPool(id);
    this.logger.log(
      `pool ${pool.id} ${pool.name ?? "(unnamed)"}: ${pool.postIds.length} posts`,
    );
    const filenameFor =
      naming === "md5" ? md5Filename : sequenceFilename(pool.postIds.length);
    const report = emptyReport();

    // The index follows pool position, so it advances past failed posts too.
    for (const [index, postId] of pool.postIds.entries()) {
      const result = await this.attempt(postId, async () => {
        const post = await this.api.fetchPost(postId);
        return this.save(post, filenameFor(post, index));
      });
      this.record("pool", result, report);
    }

    return report;
  }

  async downloadTags(tags: string[]): Promise<BatchReport> {
    this.logger.log(`search ${tags.join(" ")}`);

    const count = await this.api.fetchPostCount(tagQuery(tags));
    const report = emptyReport();

    for (const page of pageNumbers(count)) {
      const entries = await this.api.fetchPostsPage(pageQuery(tags, page));
      this.metrics.pageFetched();

      for (const [position, entry] of entries.entries()) {
        const label: ItemId =
          isRecord(entry) && typeof entry.id === "number"
            ? entry.id
            : `page ${page} #${position + 1}`;

        const result = await this.attempt(label, async () => {
          const post = toDownloadablePost(entry);
          return this.save(post, md5Filename(post, position));
        });
        this.record("tags", result, report);
      }
    }

    return report;
  }

  private async save(post: DownloadablePost, filename: string): Promise<string> {
    await this.api.download(post.file_url, path.join(this.config.outputDir, filename));
    return filename;
  }

  private async attempt(
    id: ItemId,
    task: () => Promise<string>,
  ): Promise<ItemResult> {
    this.logger.log(`post ${id}`);
    try {
      return { ok: true, id, filename: await task() };
    } catch (err) {
      return { ok: false, id, reason: describeError(err) };
    }
  }

  private record(mode: ModeKind, result: ItemResult, report: BatchReport) {
    if (result.ok) {
      report.succeeded.push(result);
      this.metrics.downloaded(mode);
      return;
    }

    report.failed.push(result);
    this.metrics.failed(mode);
    this.logger.error(`error downloading post ${result.id}, ${result.reason}`);
  }
}
