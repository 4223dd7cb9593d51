#!/usr/bin/env node
import { createProgram } from "./program";
import { runDownload } from "./run";
import { envs } from "./utils/envs";
import { createLogger, PinoLogger } from "./utils/pinoLogger";

const rootLogger = createLogger();
const mainLogger = new PinoLogger("main.ts", rootLogger);

const program = createProgram((mode, options) =>
  runDownload(mode, options, rootLogger, {
    baseUrl: envs.DANBOORU_URL,
    auth: envs.DANBOORU_AUTH,
    userAgent: envs.USER_AGENT,
    timeoutMs: envs.REQUEST_TIMEOUT_SECONDS * 1000,
  }),
);

program.parseAsync(process.argv).catch((err) => {
  mainLogger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
