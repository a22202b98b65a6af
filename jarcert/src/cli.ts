#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { loadConfig } from "./config/loader.js";
import { assumeYes, terminalConfirm } from "./commands/confirm.js";
import { createCommandContext, type CommandContext } from "./commands/context.js";
import { EXIT, exitCodeFor } from "./commands/exit-codes.js";
import { runServer, type RunOptions } from "./commands/run.js";
import type { TargetKind } from "./commands/targets.js";
import { updatePluginsCommand } from "./commands/update-plugins.js";
import { validateTarget } from "./commands/validate.js";
import { listVersions } from "./commands/versions.js";
import { formatError, JarcertError } from "./errors.js";
import { createLogger, type Logger, type OutputFormat } from "./logging.js";

type GlobalOpts = {
  config?: string;
  format: OutputFormat;
  verbose?: boolean;
  quiet?: boolean;
  color: boolean;
  jvm?: number;
};

type RunCommandOpts = {
  mc?: string;
  ram?: string;
  yourkit?: boolean;
  dryRun?: boolean;
  yes?: boolean;
};

function parseFormat(value: string): OutputFormat {
  if (value !== "human" && value !== "jsonl") {
    throw new InvalidArgumentError("Expected human or jsonl.");
  }
  return value;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function write(format: OutputFormat, human: string, record: Record<string, unknown>): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify(record) + "\n");
  } else {
    console.log(human);
  }
}

function reportError(logger: Logger, err: unknown): void {
  const [summary, ...details] = formatError(err);
  const code = err instanceof JarcertError ? err.code : "UNEXPECTED";
  logger.error(summary, details.length > 0 ? { code, details } : { code });
}

/** Load config and logger from the global options, run `body`, and map failures to exit codes. */
async function withContext(cmd: Command, body: (ctx: CommandContext, globals: GlobalOpts) => Promise<void>) {
  const globals = cmd.optsWithGlobals<GlobalOpts>();
  const logger = createLogger({
    verbose: globals.verbose,
    quiet: globals.quiet,
    noColor: !globals.color,
    format: globals.format,
  });
  try {
    const config = loadConfig({ configPath: globals.config });
    await body(createCommandContext(config, logger), globals);
  } catch (err) {
    reportError(logger, err);
    process.exit(exitCodeFor(err));
  }
}

const program = new Command();

program
  .name("jarcert")
  .description("Certify, download and build server artifacts, then run them")
  .version("0.1.0")
  .option("--config <path>", "Path to config file (default: ./jarcert.yaml)")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .option("--verbose", "Log debug output")
  .option("--quiet", "Only log errors")
  .option("--no-color", "Disable colored output")
  .option("--jvm <major>", "JVM major version to run with", parseInteger);

function addRunOptions(cmd: Command): Command {
  return cmd
    .option("--mc <version>", "Product version to run (default: latest known)")
    .option("--ram <size>", "Heap size, e.g. 2G")
    .option("--yourkit", "Attach the YourKit profiling agent")
    .option("--dry-run", "Resolve the artifact and print the launch command without starting")
    .option("--yes", "Answer yes to every confirmation");
}

async function runAndExit(ctx: CommandContext, globals: GlobalOpts, kind: TargetKind, options: RunOptions) {
  const report = await runServer(ctx, kind, options);
  if (report.exitCode === null) {
    write(globals.format, [`Artifact: ${report.artifactPath}`, `${report.java} ${report.javaArgs.join(" ")}`].join("\n"), {
      level: "info",
      code: "DRY_RUN",
      ...report,
    });
    return;
  }
  process.exit(report.exitCode);
}

const runCmd = program.command("run").description("Run the server, resolving its artifact first");

addRunOptions(
  runCmd
    .command("official")
    .description("Run an official build from the build catalog")
    .option("--build <number>", "Explicit build number (default: latest)", parseInteger),
).action(async (opts: RunCommandOpts & { build?: number }, cmd: Command) => {
  await withContext(cmd, (ctx, globals) =>
    runAndExit(ctx, globals, "official", {
      version: opts.mc,
      build: opts.build,
      memory: opts.ram,
      yourkit: opts.yourkit,
      dryRun: opts.dryRun,
      jvmMajor: globals.jvm,
      confirm: opts.yes ? assumeYes : terminalConfirm,
    }),
  );
});

addRunOptions(
  runCmd
    .command("dev")
    .description("Run a development build, compiling it when its cache is invalid")
    .option("--repo <path>", "Path to the development repository")
    .option("-r, --recompile", "Recheck the development artifact; it is only rebuilt when its cache is invalid"),
).action(async (opts: RunCommandOpts & { repo?: string; recompile?: boolean }, cmd: Command) => {
  await withContext(cmd, (ctx, globals) =>
    runAndExit(ctx, globals, "dev", {
      version: opts.mc,
      repo: opts.repo,
      recompile: opts.recompile,
      memory: opts.ram,
      yourkit: opts.yourkit,
      dryRun: opts.dryRun,
      jvmMajor: globals.jvm,
      confirm: opts.yes ? assumeYes : terminalConfirm,
    }),
  );
});

program
  .command("validate")
  .description("Check whether a cached artifact can be reused")
  .argument("<target>", "official|dev")
  .option("--mc <version>", "Product version (default: latest known)")
  .option("--build <number>", "Official build number (default: latest)", parseInteger)
  .option("--repo <path>", "Path to the development repository")
  .action(async (target: string, opts: { mc?: string; build?: number; repo?: string }, cmd: Command) => {
    if (target !== "official" && target !== "dev") {
      console.error(`Unknown target: ${target} (expected official or dev)`);
      process.exit(EXIT.INVALID_ARGS);
    }
    const kind: TargetKind = target;
    await withContext(cmd, async (ctx, globals) => {
      const report = await validateTarget(ctx, kind, { version: opts.mc, build: opts.build, repo: opts.repo });
      if (report.valid) {
        write(globals.format, `Valid: ${report.descriptor} (${report.path})`, { level: "info", code: "OK", ...report });
        return;
      }
      const human = [`Invalid: ${report.descriptor}`, ...(report.problem ?? []).map((l) => `  ${l}`)].join("\n");
      write(globals.format, human, { level: "warn", code: "CACHE_INVALID", ...report });
      process.exit(EXIT.CACHE_INVALID);
    });
  });

program
  .command("update-plugins")
  .description("Download missing plugin jars")
  .option("--force", "Download every jar, even when present")
  .option("--ignore <glob>", "Skip plugins whose name matches (repeatable)", collect, [])
  .action(async (opts: { force?: boolean; ignore: string[] }, cmd: Command) => {
    await withContext(cmd, async (ctx, globals) => {
      const results = await updatePluginsCommand(ctx.config, { force: opts.force, ignore: opts.ignore });
      for (const r of results) {
        const human =
          r.status === "skipped" ? `Skipping ${r.plugin}` : `${r.status === "downloaded" ? "Downloaded" : "Already exists"}: ${r.jar}`;
        write(globals.format, human, { level: "info", ...r });
      }
    });
  });

program
  .command("versions")
  .description("List product versions known to the build catalog, or the builds of one version")
  .argument("[version]", "Show builds for this version")
  .action(async (version: string | undefined, _opts: unknown, cmd: Command) => {
    await withContext(cmd, async (ctx, globals) => {
      for (const entry of await listVersions(ctx, version)) {
        const human = entry.builds === null ? entry.version : `${entry.version}: ${entry.builds.join(", ")}`;
        write(globals.format, human, { level: "info", ...entry });
      }
    });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
