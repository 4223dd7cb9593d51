import pino, { Level, Logger as Pino } from "pino";
import pretty from "pino-pretty";
import { Logger } from "../types/logger";

export class PinoLogger implements Logger {
  constructor(
    private readonly prefix: string,
    private readonly base: Pino,
  ) {}

  log(msg: string) {
    this.base.info(`[${this.prefix}] ${msg}`);
  }

  warn(msg: string) {
    this.base.warn(`[${this.prefix}] ${msg}`);
  }

  error(msg: string) {
    this.base.error(`[${this.prefix}] ${msg}`);
  }

  debug(msg: string) {
    this.base.debug(`[${this.prefix}] ${msg}`);
  }
}

export const verbosityLevel = (verbosity: number): Level => {
  if (verbosity >= 2) return "debug";
  if (verbosity === 1) return "info";
  return "warn";
};

// Logs go to stderr; sync so nothing is lost on process.exit.
export const createLogger = (): Pino =>
  pino(
    { level: "debug" },
    pretty({
      colorize: true,
      ignore: "pid,hostname,time",
      sync: true,
      destination: 2,
    }),
  );
