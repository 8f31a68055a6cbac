import chalk from "chalk";
import { PromptCancelledError, ScaffoldError } from "@core/errors";

const PREFIX = "[pyscaff]";

export function logInfo(message: string) {
  console.log(chalk.cyan(`${PREFIX} ${message}`));
}

export function logSuccess(message: string) {
  console.log(chalk.green(`${PREFIX} ${message}`));
}

export function logWarn(message: string) {
  console.warn(chalk.yellow(`${PREFIX} ${message}`));
}

export function logError(message: string, err?: unknown) {
  console.error(chalk.red(`${PREFIX} ${message}`));
  if (err) console.error(err);
}

/** Report a command failure; a cancelled prompt has already printed its own message. */
export function logFailure(message: string, err: unknown) {
  if (err instanceof PromptCancelledError) return;
  if (err instanceof ScaffoldError) {
    logError(err.message);
    return;
  }
  logError(message, err);
}
