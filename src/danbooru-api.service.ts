import path from "path";
import { HttpError, MalformedResponseError } from "./errors";
import { DownloadablePost, Pool } from "./types/danbooru";
import { Logger } from "./types/logger";
import { buildUrl, isAbsoluteUrl, UrlConfig } from "./utils/build-url";
import { toDownloadablePost, toPool, toPostCount } from "./utils/decode";
import { HttpClient, HttpResponse } from "./utils/http-client";

export class DanbooruApiService {
  constructor(
    private readonly http: HttpClient,
    private readonly config: UrlConfig,
    private readonly logger: Logger,
  ) {}

  buildUrl(endpoint: string): string {
    return buildUrl(endpoint, this.config);
  }

  async fetchPost(id: number): Promise<DownloadablePost> {
    this.logger.debug(`fetchPost ${id}`);
    return toDownloadablePost(await this.getJson(`/posts/${id}.json`), id);
  }

  async fetchPool(id: number): Promise<Pool> {
    this.logger.debug(`fetchPool ${id}`);
    return toPool(await this.getJson(`/pools/${id}.json`), id);
  }

  async fetchPostCount(params: string): Promise<number> {
    this.logger.debug(`fetchPostCount ${params}`);
    return toPostCount(await this.getJson(`/counts/posts.json?${params}`));
  }

  /** Entries are left undecoded so each one can fail on its own. */
  async fetchPostsPage(params: string): Promise<unknown[]> {
    this.logger.debug(`fetchPostsPage ${params}`);
    const body = await this.getJson(`/posts.json?${params}`);
    if (!Array.isArray(body))
      throw new MalformedResponseError(
        `post listing for ${params} is not an array`,
      );
    return body;
  }

  async download(fileUrl: string, dest: string): Promise<void> {
    this.logger.log(`download ${fileUrl} => ${path.basename(dest)}`);

    const url = isAbsoluteUrl(fileUrl) ? fileUrl : this.buildUrl(fileUrl);
    const response = await this.http.mirror(url, dest);
    this.assertSuccess(response, fileUrl);

    this.logger.log(response.status === 304 ? "unchanged" : "done");
  }

  private async getJson(endpoint: string): Promise<unknown> {
    const response = await this.http.get(this.buildUrl(endpoint));
    this.assertSuccess(response, endpoint);

    try {
      return JSON.parse(response.content);
    } catch (err) {
      throw new MalformedResponseError(`invalid JSON from ${endpoint}`, {
        cause: err,
      });
    }
  }

  private assertSuccess(response: HttpResponse, target: string): void {
    if (response.success) return;
    this.logger.debug(
      `request failed: ${JSON.stringify({ target, status: response.status, reason: response.reason })}`,
    );
    throw new HttpError(response.status, response.reason);
  }
}
