import { execaSync } from "execa";
import type { UserConfig } from "../types/config";
import { ExternalToolError } from "./errors";

const INIT_STEPS: string[][] = [
  ["init"],
  ["add", "."],
  ["commit", "-m", "init"],
  ["branch", "-M", "main"],
];

function readGitValue(key: string): string | null {
  try {
    const { stdout } = execaSync("git", ["config", "--get", key]);
    const value = stdout.trim();
    return value.length > 0 ? value : null;
  } catch {
    // git missing or key unset
    return null;
  }
}

/** The identity from the user's git configuration, or null when either part is missing. */
export function readGitUserConfig(): UserConfig | null {
  const author = readGitValue("user.name");
  const authorEmail = readGitValue("user.email");
  if (!author || !authorEmail) return null;
  return { author, authorEmail };
}

/**
 * Initialise a repository in `cwd` and record the scaffold as the first commit.
 * Stops at the first failing step and returns it as an error instead of throwing.
 */
export function initRepository(cwd: string): ExternalToolError | null {
  for (const args of INIT_STEPS) {
    try {
      execaSync("git", args, { cwd });
    } catch (err) {
      return new ExternalToolError(`git ${args.join(" ")}`, { cause: err });
    }
  }
  return null;
}
