import { spawn as nodeSpawn } from "node:child_process";
import type { RawTool, RawToolDefinition } from "../catalog/types";
import type { SourceDescriptor, SourceDescriptorOf } from "../config";
import { inheritedEnv } from "./env";
import { expectProtocol, RemoteToolError, SourceTimeoutError } from "./errors";
import { decodeJson, parseManual, tryDecodeJson } from "./manual";
import { createSession } from "./session";
import type { DriverOptions, SourceSession, ToolSourceDriver } from "./types";

type CliSource = SourceDescriptorOf<"cli">;

export type CommandRequest = {
  command: string;
  args: string[];
  env: Record<string, string>;
  cwd?: string;
  timeoutMs: number;
};

export type CommandResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
};

/**
 * Runs one command to completion. Injected in tests.
 */
export type CommandRunner = (request: CommandRequest) => Promise<CommandResult>;

export type CliDriverOptions = DriverOptions & {
  runner?: CommandRunner;
};

const DEFAULT_REQUEST_TIMEOUT = 30000;

/**
 * Default runner on node:child_process. Rejects with SourceTimeoutError
 * when the process outlives the timeout.
 */
export const spawnCommand: CommandRunner = request =>
  new Promise<CommandResult>((resolve, reject) => {
    const child = nodeSpawn(request.command, request.args, {
      cwd: request.cwd,
      env: request.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, request.timeoutMs);

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.once("error", error => {
      clearTimeout(timer);
      reject(error);
    });

    child.once("close", code => {
      clearTimeout(timer);
      if (timedOut) {
        reject(new SourceTimeoutError(`Command ${request.command} timed out after ${request.timeoutMs}ms`));
        return;
      }
      resolve({
        exitCode: code,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
      });
    });
  });

/**
 * Render call arguments as `--key value` flags. `true` becomes a bare flag,
 * `false` and null are omitted, objects are passed as JSON.
 */
export function toCommandFlags(args: Record<string, unknown>): string[] {
  const flags: string[] = [];
  for (const [key, value] of Object.entries(args)) {
    if (value === undefined || value === null || value === false) continue;
    if (value === true) {
      flags.push(`--${key}`);
    } else {
      flags.push(`--${key}`, typeof value === "object" ? JSON.stringify(value) : String(value));
    }
  }
  return flags;
}

/**
 * CLI source: the command prints its manual on stdout; tools run as
 * separate processes
 */
export class CliDriver implements ToolSourceDriver {
  readonly protocolKind = "cli";
  private readonly runner: CommandRunner;
  private readonly requestTimeout: number;

  constructor(options: CliDriverOptions = {}) {
    this.runner = options.runner ?? spawnCommand;
    this.requestTimeout = options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT;
  }

  async openSession(source: SourceDescriptor): Promise<SourceSession> {
    return createSession(expectProtocol(source, "cli"));
  }

  async closeSession(_session: SourceSession): Promise<void> {
    // Processes end with each run
  }

  private async run(source: CliSource, extraArgs: string[]): Promise<string> {
    const [command, ...args] = source.command;
    if (command === undefined) {
      throw new Error(`CLI source ${source.name} has no command`);
    }

    const result = await this.runner({
      command,
      args: [...args, ...extraArgs],
      env: { ...inheritedEnv(), ...source.environment },
      cwd: source.workingDir,
      timeoutMs: this.requestTimeout,
    });

    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || result.stdout.trim();
      throw new RemoteToolError(
        `Command ${command} exited with code ${result.exitCode ?? "null"}${detail ? `: ${detail.slice(0, 500)}` : ""}`,
      );
    }
    return result.stdout;
  }

  async discover(session: SourceSession): Promise<RawToolDefinition[]> {
    const source = expectProtocol(session.source, "cli");
    const stdout = await this.run(source, []);
    return parseManual(decodeJson(stdout, `Manual from ${source.name}`), source);
  }

  async invoke(session: SourceSession, tool: RawTool, args: Record<string, unknown>): Promise<unknown> {
    const source = expectProtocol(session.source, "cli");
    const callTemplate = tool.callTemplate;
    const template = callTemplate?.protocolKind === "cli" ? callTemplate : source;
    const stdout = await this.run(template, toCommandFlags(args));
    const trimmed = stdout.trim();
    return trimmed === "" ? "" : tryDecodeJson(trimmed);
  }
}
