/**
 * Best-effort git provenance for a working directory.
 * Any failure (no directory, not a repo, no git binary, timeout) reads as
 * absence; nothing here throws.
 */

import { execFile as execFileCb } from "child_process";
import { existsSync } from "fs";
import { promisify } from "util";
import { describeError, log } from "../log.js";

const execFile = promisify(execFileCb);

export const GIT_TIMEOUT_MS = 1000;

export interface GitContext {
  remoteUrl: string | null;
  commitHash: string | null;
}

export type GitResolver = (dir: string) => Promise<GitContext | null>;

async function git(dir: string, args: string[], timeoutMs: number): Promise<string | null> {
  try {
    const { stdout } = await execFile("git", ["-C", dir, ...args], { timeout: timeoutMs, encoding: "utf-8" });
    const value = stdout.trim();
    return value.length > 0 ? value : null;
  } catch (err) {
    log.debug(`git ${args.join(" ")} failed in ${dir}: ${describeError(err)}`);
    return null;
  }
}

/**
 * Origin remote URL and HEAD commit of the repository containing dir.
 * Returns null when neither is known.
 */
export async function resolveGitContext(dir: string, timeoutMs = GIT_TIMEOUT_MS): Promise<GitContext | null> {
  if (!dir || !existsSync(dir)) return null;
  const [remoteUrl, commitHash] = await Promise.all([
    git(dir, ["remote", "get-url", "origin"], timeoutMs),
    git(dir, ["rev-parse", "HEAD"], timeoutMs),
  ]);
  if (remoteUrl === null && commitHash === null) return null;
  return { remoteUrl, commitHash };
}
