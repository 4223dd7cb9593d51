import { Command } from "commander";
import { z } from "zod";
import { Mode } from "./types/mode";

const USAGE_ERROR = { exitCode: 2 };

const CommonOptionsSchema = z.object({
  outputDir: z.string().min(1).default("."),
  verbose: z.number().int().nonnegative().default(0),
  metricsFile: z.string().min(1).optional(),
});

const PoolOptionsSchema = CommonOptionsSchema.extend({
  md5: z.boolean().default(false),
});

const IdSchema = z
  .string()
  .regex(/^[1-9]\d*$/)
  .transform(Number);

export type RunOptions = z.infer<typeof CommonOptionsSchema>;

export type RunHandler = (mode: Mode, options: RunOptions) => Promise<unknown>;

const increaseVerbosity = (_value: string, previous: number) => previous + 1;

function withCommonOptions(command: Command): Command {
  return command
    .option(
      "-d, --output-dir <dir>",
      "output directory, created if it does not exist",
      ".",
    )
    .option(
      "-v, --verbose",
      "be more talkative, repeat for debug output",
      increaseVerbosity,
      0,
    )
    .option(
      "--metrics-file <path>",
      "write run counters in Prometheus text format to <path>",
    );
}

function parseOptions<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  opts: unknown,
  command: Command,
): T {
  const result = schema.safeParse(opts);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message);
    return command.error(`error: invalid options: ${issues.join(", ")}`, USAGE_ERROR);
  }
  return result.data;
}

function parseId(value: string, command: Command): number {
  const result = IdSchema.safeParse(value);
  if (!result.success)
    return command.error(
      `error: invalid ID '${value}', expected a positive integer`,
      USAGE_ERROR,
    );
  return result.data;
}

/**
 * Builds the CLI. `configure` runs before the subcommands are added so that
 * settings such as `exitOverride` are inherited by them.
 */
export function createProgram(
  run: RunHandler,
  configure?: (program: Command) => void,
): Command {
  const program = new Command();
  configure?.(program);

  program
    .name("booru-fetch")
    .description("Download Danbooru posts by ID, pool, or tag search")
    .version("1.0.0");

  withCommonOptions(
    program
      .command("post")
      .description("download posts by ID, files named by MD5")
      .argument("<ids...>", "post IDs"),
  ).action(async (ids: string[], opts: unknown, command: Command) => {
    const options = parseOptions(CommonOptionsSchema, opts, command);
    await run(
      { kind: "post", ids: ids.map((id) => parseId(id, command)) },
      options,
    );
  });

  withCommonOptions(
    program
      .command("pool")
      .description("download a pool, files numbered in pool order")
      .argument("<id>", "pool ID")
      .option("--md5", "name files by MD5 checksum instead"),
  ).action(async (id: string, opts: unknown, command: Command) => {
    const { md5, ...options } = parseOptions(PoolOptionsSchema, opts, command);
    await run(
      { kind: "pool", id: parseId(id, command), naming: md5 ? "md5" : "sequence" },
      options,
    );
  });

  withCommonOptions(
    program
      .command("tags")
      .description("download every post matching all given tags")
      .argument("<tags...>", "tags to search for"),
  ).action(async (tags: string[], opts: unknown, command: Command) => {
    const options = parseOptions(CommonOptionsSchema, opts, command);
    await run({ kind: "tags", tags }, options);
  });

  return program;
}
