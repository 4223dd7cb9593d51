import fs from "fs";
import path from "path";
import { Logger as Pino } from "pino";
import { DanbooruApiService } from "./danbooru-api.service";
import { DownloadMetrics } from "./download-metrics";
import { DownloaderService } from "./downloader.service";
import { RunOptions } from "./program";
import { Mode } from "./types/mode";
import { BatchReport } from "./types/result";
import { HttpClient } from "./utils/http-client";
import { PinoLogger, verbosityLevel } from "./utils/pinoLogger";

export interface RunEnvironment {
  baseUrl: string;
  auth?: string;
  userAgent: string;
  timeoutMs: number;
}

export async function runDownload(
  mode: Mode,
  options: RunOptions,
  rootLogger: Pino,
  env: RunEnvironment,
): Promise<BatchReport> {
  const pino = rootLogger.child({}, { level: verbosityLevel(options.verbose) });
  const logger = new PinoLogger("run", pino);
  logger.debug(`mode: ${JSON.stringify(mode)}`);
  logger.debug(`options: ${JSON.stringify(options)}`);

  const outputDir = path.resolve(options.outputDir);
  if (!fs.existsSync(outputDir)) fs.mkdirSync(outputDir, { recursive: true });

  const metrics = new DownloadMetrics();
  const api = new DanbooruApiService(
    new HttpClient({ userAgent: env.userAgent, timeoutMs: env.timeoutMs }),
    { baseUrl: env.baseUrl, auth: env.auth },
    new PinoLogger(DanbooruApiService.name, pino),
  );
  const downloader = new DownloaderService(
    api,
    { outputDir },
    new PinoLogger(DownloaderService.name, pino),
    metrics,
  );

  const report = await downloader.run(mode);
  logger.log(
    `${report.succeeded.length} downloaded, ${report.failed.length} failed`,
  );

  if (options.metricsFile)
    fs.writeFileSync(path.resolve(options.metricsFile), await metrics.render());

  return report;
}
