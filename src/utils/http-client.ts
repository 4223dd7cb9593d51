import { once } from "events";
import fs from "fs";
import http, {
  IncomingHttpHeaders,
  IncomingMessage,
  OutgoingHttpHeaders,
  RequestOptions,
} from "http";
import https from "https";
import { pipeline } from "stream";
import { promisify } from "util";

const pipelineAsync = promisify(pipeline);

const REDIRECT_STATUSES = [301, 302, 303, 307, 308];

export interface HttpResponse {
  success: boolean;
  status: number;
  reason: string;
  headers: IncomingHttpHeaders;
}

export interface HttpContentResponse extends HttpResponse {
  content: string;
}

export interface HttpClientOptions {
  userAgent: string;
  timeoutMs?: number;
  maxRedirects?: number;
}

const toHttpResponse = (message: IncomingMessage): HttpResponse => {
  const status = message.statusCode ?? 0;
  return {
    success: status >= 200 && status < 300,
    status,
    reason: message.statusMessage ?? "",
    headers: message.headers,
  };
};

const readBody = (message: IncomingMessage): Promise<string> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    message.on("data", (chunk: Buffer) => chunks.push(chunk));
    message.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    message.on("error", reject);
  });

const parseHttpDate = (value: string | undefined): Date | undefined => {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
};

/**
 * Minimal blocking-style client: one request at a time, redirects followed,
 * credentials taken from the URL userinfo.
 */
export class HttpClient {
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;

  constructor(private readonly options: HttpClientOptions) {
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.maxRedirects = options.maxRedirects ?? 5;
  }

  async get(url: string): Promise<HttpContentResponse> {
    const message = await this.open(url, {});
    const content = await readBody(message);
    return { ...toHttpResponse(message), content };
  }

  /**
   * Downloads `url` to `dest` unless the server reports the existing file as
   * unmodified. The body lands in a temporary file first and replaces `dest`
   * only once complete.
   */
  async mirror(url: string, dest: string): Promise<HttpResponse> {
    const headers: OutgoingHttpHeaders = {};
    if (fs.existsSync(dest))
      headers["If-Modified-Since"] = fs.statSync(dest).mtime.toUTCString();

    const message = await this.open(url, headers);
    const response = toHttpResponse(message);

    if (response.status === 304) {
      message.resume();
      return { ...response, success: true };
    }
    if (!response.success) {
      message.resume();
      return response;
    }

    const tempPath = `${dest}.${process.pid}.part`;
    const file = fs.createWriteStream(tempPath);
    try {
      await pipelineAsync(message, file);
    } catch (err) {
      // The stream may still be opening; wait so the unlink is final.
      if (!file.closed) await once(file, "close");
      if (fs.existsSync(tempPath)) fs.unlinkSync(tempPath);
      throw err;
    }
    fs.renameSync(tempPath, dest);

    const lastModified = parseHttpDate(response.headers["last-modified"]);
    if (lastModified) fs.utimesSync(dest, lastModified, lastModified);

    return response;
  }

  private open(
    url: string,
    headers: OutgoingHttpHeaders,
    redirectsLeft = this.maxRedirects,
  ): Promise<IncomingMessage> {
    const target = new URL(url);
    const requestOptions: RequestOptions = {
      headers: { "User-Agent": this.options.userAgent, ...headers },
    };

    return new Promise((resolve, reject) => {
      const onResponse = (message: IncomingMessage) => {
        const location = message.headers.location;
        const status = message.statusCode ?? 0;
        if (location && REDIRECT_STATUSES.includes(status) && redirectsLeft > 0) {
          message.resume();
          this.open(new URL(location, target).toString(), headers, redirectsLeft - 1)
            .then(resolve, reject);
          return;
        }
        resolve(message);
      };

      const request =
        target.protocol === "http:"
          ? http.get(target, requestOptions, onResponse)
          : https.get(target, requestOptions, onResponse);

      request.setTimeout(this.timeoutMs, () =>
        request.destroy(
          new Error(`request timed out after ${this.timeoutMs}ms`),
        ),
      );
      request.on("error", reject);
    });
  }
}
