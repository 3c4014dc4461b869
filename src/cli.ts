import { Command, CommanderError, InvalidArgumentError } from "commander";
import {
  MonitorConfigInput,
  SUPPORTED_ALGORITHMS,
  HashAlgorithm,
  parseLogLevel,
  resolveConfig,
} from "./config";
import { IntegrityError, errorMessage } from "./errors";
import { DigestWatcher } from "./monitor/DigestWatcher";
import { IntegrityMonitor } from "./monitor/IntegrityMonitor";
import { CommandOutputProbe, CommandRunner } from "./probe/StateProbe";
import { configureLogger, createModuleLogger } from "./utils/logger";
import { ProgressEvent, RunProgress } from "./utils/RunProgress";

const log = createModuleLogger("cli");

export const ExitCodes = {
  OK: 0,
  VIOLATIONS: 1,
  FAILURE: 2,
} as const;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env?: NodeJS.ProcessEnv;
  /** Resolves when a long-running command should stop */
  waitForShutdown?: () => Promise<void>;
  runner?: CommandRunner;
}

type GlobalOptions = {
  root?: string;
  algorithm?: HashAlgorithm;
  concurrency?: number;
  chunkSize?: number;
  logLevel?: string;
  quiet?: boolean;
};

interface PassOptions {
  oneshot?: boolean;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function parseAlgorithm(value: string): HashAlgorithm {
  const match = SUPPORTED_ALGORITHMS.find((algorithm) => algorithm === value);
  if (!match) {
    throw new InvalidArgumentError(
      `Expected one of ${SUPPORTED_ALGORITHMS.join(", ")}.`,
    );
  }
  return match;
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    const stop = () => {
      process.off("SIGINT", stop);
      process.off("SIGTERM", stop);
      resolve();
    };
    process.on("SIGINT", stop);
    process.on("SIGTERM", stop);
  });
}

/**
 * Hook runners pass file names; with none (or --oneshot) the whole root is scanned
 */
function targetPaths(files: string[], options: PassOptions): string[] | undefined {
  return options.oneshot || files.length === 0 ? undefined : files;
}

/**
 * Runs the CLI and resolves with the process exit code
 */
export async function runCli(
  argv: string[],
  io: CliIO = defaultIO,
): Promise<number> {
  let exitCode: number = ExitCodes.OK;

  const setup = (command: Command) => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    configureLogger({
      level: parseLogLevel(
        globals.logLevel ?? (io.env ?? process.env).LOG_LEVEL,
      ),
      quiet: globals.quiet,
    });
    const overrides: MonitorConfigInput = {
      root: globals.root,
      algorithm: globals.algorithm,
      concurrency: globals.concurrency,
      chunkSize: globals.chunkSize,
    };
    return resolveConfig(overrides, io.env ?? process.env);
  };

  const createMonitor = (command: Command) => {
    const progress = new RunProgress();
    progress.onProgress((event: ProgressEvent) => {
      log.debug(
        `[${event.completed}/${event.total}] ${event.mode} ${event.relativePath}`,
      );
    });
    return new IntegrityMonitor(setup(command), { progress });
  };

  const program = new Command();
  program
    .name("sidecar-integrity")
    .description("Maintain and verify SHA-256 sidecar files for data-lake files")
    .option("--root <dir>", "directory the path patterns are matched against")
    .option("--algorithm <name>", "hash algorithm", parseAlgorithm)
    .option("--concurrency <n>", "files hashed in parallel", parseInteger)
    .option("--chunk-size <bytes>", "read size while hashing", parseInteger)
    .option("--log-level <level>", "error, warn, info or debug")
    .option("--quiet", "disable logging")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });

  program
    .command("update")
    .description("compute and write sidecars for the given data files")
    .argument("[files...]", "data files, as passed by the hook runner")
    .option("--oneshot", "scan the configured root instead of the file list")
    .action(async (files: string[], options: PassOptions, command: Command) => {
      const monitor = createMonitor(command);
      const report = await monitor.update(targetPaths(files, options));
      io.stdout(
        `Wrote ${report.written} sidecar(s), ${RunProgress.formatBytes(report.bytesHashed)} hashed\n`,
      );
    });

  program
    .command("verify")
    .description("fail if any data file disagrees with its sidecar")
    .argument("[files...]", "data files, as passed by the hook runner")
    .option("--oneshot", "scan the configured root instead of the file list")
    .action(async (files: string[], options: PassOptions, command: Command) => {
      const monitor = createMonitor(command);
      const report = await monitor.verify(targetPaths(files, options));
      if (!report.ok) {
        for (const violation of report.violations) {
          io.stderr(`${violation.kind} ${violation.relativePath}\n`);
        }
        io.stderr(
          `${report.violations.length} of ${report.checked} file(s) failed integrity verification\n`,
        );
        exitCode = ExitCodes.VIOLATIONS;
      }
    });

  program
    .command("watch")
    .description("rewrite sidecars as soon as tracked files change")
    .option("--debounce <ms>", "quiet period before hashing", parseInteger)
    .action(async (options: { debounce?: number }, command: Command) => {
      const watcher = new DigestWatcher(setup(command), {
        debounceMs: options.debounce,
      });
      watcher.start();
      await (io.waitForShutdown ?? waitForSignal)();
      watcher.stop();
    });

  program
    .command("check-state")
    .description("compare a command's output with a committed reference file")
    .argument("<expected>", "file holding the expected output")
    .argument("<command>", "command producing the actual state")
    .argument("[args...]", "command arguments")
    .allowUnknownOption()
    .action(
      async (
        expected: string,
        commandName: string,
        args: string[],
        _options: unknown,
        command: Command,
      ) => {
        setup(command);
        const probe = new CommandOutputProbe({
          command: commandName,
          args,
          expectedFile: expected,
          runner: io.runner,
        });
        const result = await probe.check();
        if (!result.matches) {
          io.stderr(`${result.detail ?? "State mismatch"}\n`);
          exitCode = ExitCodes.VIOLATIONS;
        }
      },
    );

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.code === "commander.helpDisplayed" ||
        error.code === "commander.version"
        ? ExitCodes.OK
        : ExitCodes.FAILURE;
    }
    if (error instanceof IntegrityError) {
      io.stderr(`${error.name}: ${error.message}\n`);
      return ExitCodes.FAILURE;
    }
    const message = errorMessage(error);
    log.error(`Unexpected failure: ${message}`);
    io.stderr(`Error: ${message}\n`);
    return ExitCodes.FAILURE;
  }

  return exitCode;
}
