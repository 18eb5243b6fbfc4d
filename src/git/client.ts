/**
 * Git CLI client wrapper using child_process.execFile
 */

import { execFile } from "node:child_process";
import type { GitRefs } from "../types";
import { maskSecrets } from "../utils/url";

export interface GitRunResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
}

export interface GitRunOptions {
  cwd?: string;
  /** Kill the process after this many milliseconds (0 or unset = never) */
  timeoutMs?: number;
}

/**
 * Anything that can execute a git command line. Tests substitute an in-process fake.
 */
export type GitRunner = (args: string[], options?: GitRunOptions) => Promise<GitRunResult>;

/** Output from `git bundle list-heads` on a file that is not a bundle contains this */
export const INVALID_BUNDLE_SIGNAL = "does not look like";

export const PSEUDO_REFS: ReadonlySet<string> = new Set([
  "HEAD",
  "FETCH_HEAD",
  "ORIG_HEAD",
  "MERGE_HEAD",
  "CHERRY_PICK_HEAD",
]);

const MAX_BUFFER = 64 * 1024 * 1024;
const MAX_BUFFER_EXCEEDED = "ERR_CHILD_PROCESS_STDIO_MAXBUFFER";

export class GitCommandError extends Error {
  readonly args: string[];
  readonly exitCode: number;
  readonly stderr: string;
  readonly timedOut: boolean;

  constructor(args: string[], result: GitRunResult, secrets: readonly string[] = []) {
    const maskedArgs = args.map((arg) => maskSecrets(arg, secrets));
    const stderr = maskSecrets(result.stderr, secrets);
    const reason = result.timedOut ? "timed out" : `exited with code ${result.exitCode}`;
    super(`git ${maskedArgs.join(" ")} ${reason}${stderr ? `: ${stderr}` : ""}`);
    this.name = "GitCommandError";
    this.args = maskedArgs;
    this.exitCode = result.exitCode;
    this.stderr = stderr;
    this.timedOut = result.timedOut;
  }
}

export class InvalidBundleError extends Error {
  readonly bundlePath: string;

  constructor(bundlePath: string, detail: string) {
    super(`Invalid bundle ${bundlePath}: ${detail}`);
    this.name = "InvalidBundleError";
    this.bundlePath = bundlePath;
  }
}

export interface GitRunnerOptions {
  /** Per-stream output limit in bytes; the child is killed past it */
  maxBuffer?: number;
}

/**
 * Runner that executes the installed git binary. Its commands never reject
 * on a non-zero exit; only a failure to start git rejects.
 */
export function createGitRunner(runnerOptions: GitRunnerOptions = {}): GitRunner {
  const maxBuffer = runnerOptions.maxBuffer ?? MAX_BUFFER;

  return (args, options = {}) =>
    new Promise((resolve, reject) => {
      execFile(
        "git",
        args,
        {
          cwd: options.cwd,
          timeout: options.timeoutMs ?? 0,
          killSignal: "SIGKILL",
          maxBuffer,
          env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
          encoding: "utf8",
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ success: true, stdout: stdout.trim(), stderr: stderr.trim(), exitCode: 0, timedOut: false });
            return;
          }

          // execFile kills the child when output overflows, so check this before `killed`
          if (error.code === MAX_BUFFER_EXCEEDED) {
            resolve({
              success: false,
              stdout: "",
              stderr: `output exceeded ${maxBuffer} bytes`,
              exitCode: -1,
              timedOut: false,
            });
            return;
          }

          // Spawn failures (git missing, bad cwd) carry a string code
          if (typeof error.code === "string" && !error.killed) {
            reject(error);
            return;
          }

          resolve({
            success: false,
            stdout: stdout.trim(),
            stderr: stderr.trim(),
            exitCode: typeof error.code === "number" ? error.code : -1,
            timedOut: error.killed === true,
          });
        },
      );
    });
}

export const runGit: GitRunner = createGitRunner();

/**
 * Parse `<sha> <ref>` or `<sha>\t<ref>` lines into a ref map,
 * dropping pseudo-refs and peeled tag entries.
 */
export function parseRefs(output: string): GitRefs {
  const refs: GitRefs = new Map();

  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const [sha, ref] = trimmed.split(/\s+/);
    if (!sha || !ref) continue;
    if (PSEUDO_REFS.has(ref) || ref.endsWith("^{}")) continue;

    refs.set(ref, sha);
  }

  return refs;
}

export function refsEqual(a: GitRefs, b: GitRefs): boolean {
  if (a.size !== b.size) return false;
  for (const [ref, sha] of a) {
    if (b.get(ref) !== sha) return false;
  }
  return true;
}

export interface ObjectCounts {
  loose: number;
  packed: number;
}

export interface GitClientOptions {
  runner?: GitRunner;
  /** Per-command timeout in milliseconds, 0 = none */
  timeoutMs?: number;
  /** Values to mask in error messages */
  secrets?: readonly string[];
}

/**
 * Typed git operations used by the backup pipeline
 */
export class GitClient {
  private readonly runner: GitRunner;
  private readonly timeoutMs: number;
  private readonly secrets: readonly string[];

  constructor(options: GitClientOptions = {}) {
    this.runner = options.runner ?? runGit;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.secrets = options.secrets ?? [];
  }

  /** Copy of this client that masks additional secrets */
  withSecrets(secrets: readonly string[]): GitClient {
    return new GitClient({
      runner: this.runner,
      timeoutMs: this.timeoutMs,
      secrets: [...this.secrets, ...secrets],
    });
  }

  private async run(args: string[], cwd?: string): Promise<GitRunResult> {
    const result = await this.runner(args, { cwd, timeoutMs: this.timeoutMs });
    if (!result.success) {
      throw new GitCommandError(args, result, this.secrets);
    }
    return result;
  }

  async mirrorClone(url: string, destination: string): Promise<void> {
    await this.run(["clone", "-v", "--mirror", url, destination]);
  }

  async lsRemote(url: string): Promise<GitRefs> {
    const result = await this.run(["ls-remote", url]);
    return parseRefs(result.stdout);
  }

  /**
   * Heads recorded in a bundle file. Throws InvalidBundleError when git
   * says the file is not a bundle.
   */
  async listBundleHeads(bundlePath: string): Promise<GitRefs> {
    const args = ["bundle", "list-heads", bundlePath];
    const result = await this.runner(args, { timeoutMs: this.timeoutMs });

    if (!result.success) {
      const output = `${result.stderr}\n${result.stdout}`;
      if (output.includes(INVALID_BUNDLE_SIGNAL)) {
        throw new InvalidBundleError(bundlePath, result.stderr || result.stdout);
      }
      throw new GitCommandError(args, result, this.secrets);
    }

    return parseRefs(result.stdout);
  }

  async createBundle(repoPath: string, bundlePath: string): Promise<void> {
    await this.run(["bundle", "create", bundlePath, "--all"], repoPath);
  }

  /**
   * Object counts from `git count-objects -v`
   */
  async countObjects(repoPath: string): Promise<ObjectCounts> {
    const result = await this.run(["count-objects", "-v"], repoPath);
    const counts: ObjectCounts = { loose: 0, packed: 0 };

    for (const line of result.stdout.split("\n")) {
      const [key, value] = line.split(":").map((part) => part.trim());
      if (value === undefined) continue;
      if (key === "count") counts.loose = Number.parseInt(value, 10) || 0;
      if (key === "in-pack") counts.packed = Number.parseInt(value, 10) || 0;
    }

    return counts;
  }

  /** Empty bare repository; `git bundle verify` needs one to run in */
  async initBare(path: string): Promise<void> {
    await this.run(["init", "--bare", "--quiet", path]);
  }

  async verifyBundle(bundlePath: string, cwd: string): Promise<GitRunResult> {
    return this.runner(["bundle", "verify", bundlePath], { cwd, timeoutMs: this.timeoutMs });
  }
}
