import { execFile } from "child_process";
import fs from "fs-extra";
import { ioFailure } from "../errors";

export interface ProbeResult {
  matches: boolean;
  detail?: string;
}

/**
 * Compares a desired state with the actual one. Implementations hide
 * whatever external tool produces the actual state.
 */
export interface StateProbe {
  check(): Promise<ProbeResult>;
}

/**
 * Runs a command and resolves with its stdout
 */
export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export const execFileRunner: CommandRunner = (command, args) =>
  new Promise<string>((resolve, reject) => {
    execFile(
      command,
      args,
      { encoding: "utf8", maxBuffer: 16 * 1024 * 1024 },
      (error, stdout) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(stdout);
      },
    );
  });

export interface CommandOutputProbeOptions {
  command: string;
  args?: string[];
  /** File holding the expected output */
  expectedFile: string;
  runner?: CommandRunner;
}

/**
 * Matches when a command's output equals the contents of a reference file,
 * ignoring trailing whitespace on each line and trailing blank lines.
 */
export class CommandOutputProbe implements StateProbe {
  private readonly runner: CommandRunner;

  constructor(private readonly options: CommandOutputProbeOptions) {
    this.runner = options.runner ?? execFileRunner;
  }

  async check(): Promise<ProbeResult> {
    const expected = await fs
      .readFile(this.options.expectedFile, "utf8")
      .catch((error: unknown) => {
        throw ioFailure("read", this.options.expectedFile, error);
      });
    const actual = await this.runner(
      this.options.command,
      this.options.args ?? [],
    );

    const expectedLines = normalizeLines(expected);
    const actualLines = normalizeLines(actual);
    const length = Math.max(expectedLines.length, actualLines.length);

    for (let i = 0; i < length; i++) {
      if (expectedLines[i] !== actualLines[i]) {
        return {
          matches: false,
          detail: `${this.options.expectedFile} differs from command output at line ${i + 1}`,
        };
      }
    }
    return { matches: true };
  }
}

function normalizeLines(text: string): string[] {
  const lines = text.split(/\r?\n/).map((line) => line.trimEnd());
  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}
