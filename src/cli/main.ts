#!/usr/bin/env node

import path from "path";
import { Command } from "commander";
import pluralize from "pluralize";
import { runOnce, type RunOptions } from "../core/runner";
import { watchGroupfile } from "../core/watcher";
import { initConfig } from "../core/init-config";
import { inspectGroupfile } from "../core/inspect-groupfile";
import type { GenerateCliValues } from "../core/resolve-inputs";
import { defaultLogger, type Logger } from "../util/logger";
import { DEFAULT_COORD_DIR, DEFAULT_GROUPFILE_NAME } from "../schema";

interface BaseCliOptions extends GenerateCliValues {
  config?: string;
  watch?: boolean;
  quiet?: boolean;
  debug?: boolean;
}

interface InitCliOptions {
  force?: boolean;
}

/**
 * Create a logger with the appropriate level from CLI flags.
 */
function createCliLogger(opts: { quiet?: boolean; debug?: boolean }): Logger {
  if (opts.quiet) {
    defaultLogger.setLevel("silent");
  } else if (opts.debug) {
    defaultLogger.setLevel("debug");
  }
  return defaultLogger.child("[cli]");
}

async function handleGenerateCommand(cwd: string, baseOpts: BaseCliOptions) {
  const logger = createCliLogger(baseOpts);

  const runOptions: RunOptions = {
    configPath: baseOpts.config,
    logger,
    cli: {
      replicas: baseOpts.replicas,
      workdir: baseOpts.workdir,
      basename: baseOpts.basename,
      control: baseOpts.control,
      topology: baseOpts.topology,
      source: baseOpts.source,
      coordDir: baseOpts.coordDir,
      groupfile: baseOpts.groupfile,
    },
  };

  if (baseOpts.watch) {
    // Watch mode – keeps the process alive until interrupted
    const handle = watchGroupfile(cwd, runOptions);
    process.once("SIGINT", () => {
      handle.close().then(
        () => process.exit(0),
        (err: unknown) => {
          defaultLogger.fatal(err);
          process.exit(1);
        },
      );
    });
    return;
  }

  const result = await runOnce(cwd, runOptions);
  logger.debug(
    `References in ${result.coordDirPath}: ${result.created} created, ${result.kept} kept`,
  );
}

function handleInitCommand(
  cwd: string,
  initOpts: InitCliOptions,
  baseOpts: BaseCliOptions,
) {
  const logger = createCliLogger(baseOpts);
  const result = initConfig(cwd, { force: initOpts.force, logger });
  if (result.created) {
    logger.info(`Edit ${path.basename(result.configPath)}, then run "groupfile".`);
  }
}

function handleInspectCommand(
  cwd: string,
  file: string | undefined,
  baseOpts: BaseCliOptions,
) {
  const logger = createCliLogger(baseOpts);
  const target = path.resolve(cwd, file ?? DEFAULT_GROUPFILE_NAME);

  const { records, diagnostics, missing } = inspectGroupfile(target, { logger });

  logger.info(
    `${target}: ${records.length} ${pluralize("replica", records.length)}`,
  );
  for (const record of records) {
    logger.debug(`line ${record.line}: ${record.args.join(" ")}`);
  }
  for (const diag of diagnostics) {
    logger.warn(`${diag.code}: ${diag.message}`);
  }
  for (const ref of missing) {
    logger.warn(`line ${ref.line}: ${ref.flag} ${ref.path} does not exist`);
  }

  if (diagnostics.length > 0 || missing.length > 0) {
    process.exitCode = 1;
  }
}

async function main() {
  const cwd = process.cwd();

  const program = new Command();

  program
    .name("groupfile")
    .description(
      "Generate per-replica coordinate links and an MPI groupfile for multi-replica MD runs",
    )
    .option("-n, --replicas <count>", "Number of replicas")
    .option("-w, --workdir <path>", "Working directory (default: current directory)")
    .option(
      "-b, --basename <name>",
      "Input stem: implies <name>.inp, <name>.parm7 and <name>_0.rst7",
    )
    .option("-i, --control <file>", "Shared control (mdin) file")
    .option("-p, --topology <file>", "Shared topology (prmtop) file")
    .option(
      "-s, --source <file>",
      "Structure new references link to (relative to the working directory)",
    )
    .option(
      "--coord-dir <dir>",
      `Directory for r<i> references (default: ${DEFAULT_COORD_DIR})`,
    )
    .option(
      "-g, --groupfile <file>",
      `Manifest file name (default: ${DEFAULT_GROUPFILE_NAME})`,
    )
    .option("-c, --config <path>", "Path to groupfile config file")
    .option("--watch", "Regenerate when the config or source structure changes")
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging");

  // init subcommand
  program
    .command("init")
    .description("Write a default groupfile.config.ts")
    .option("--force", "Overwrite an existing config file")
    .action((initOpts: InitCliOptions, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      handleInitCommand(cwd, initOpts, baseOpts);
    });

  // inspect subcommand
  program
    .command("inspect")
    .argument("[file]", `Groupfile to read (default: ${DEFAULT_GROUPFILE_NAME})`)
    .description(
      "Parse an existing groupfile and report replicas and missing input files",
    )
    .action((file: string | undefined, _opts: unknown, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      handleInspectCommand(cwd, file, baseOpts);
    });

  // Base command: generate once or in watch mode
  program.action(async (opts: BaseCliOptions) => {
    await handleGenerateCommand(cwd, opts);
  });

  await program.parseAsync(process.argv);
}

// Run and handle errors
main().catch((err) => {
  // Printed even under --quiet: a failed run must say which step failed.
  defaultLogger.fatal(err);
  process.exit(1);
});
