/** Base class for every failure the scaffolder reports to the user. */
export class ScaffoldError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The plugin graph contains a loop; `pending` lists the plugins that never became ready. */
export class CycleDetectedError extends ScaffoldError {
  readonly pending: string[];

  constructor(pending: string[]) {
    super(`Cycle detected in plugin dependencies: ${pending.join(", ")}`);
    this.pending = pending;
  }
}

/** Two different plugin objects were registered under the same name. */
export class DuplicatePluginError extends ScaffoldError {
  readonly pluginName: string;

  constructor(pluginName: string) {
    super(`Another plugin is already registered as "${pluginName}"`);
    this.pluginName = pluginName;
  }
}

export class PreconditionFailedError extends ScaffoldError {
  readonly plugin: string;

  constructor(plugin: string, message: string) {
    super(message);
    this.plugin = plugin;
  }
}

/** An external process (git) exited with an error or could not be spawned. */
export class ExternalToolError extends ScaffoldError {
  readonly command: string;

  constructor(command: string, options?: { cause?: unknown }) {
    super(`Command failed: ${command}`, options);
    this.command = command;
  }
}

export class ConfigValidationError extends ScaffoldError {
  readonly issues: string[];

  constructor(subject: string, issues: string[]) {
    super(`Invalid ${subject}: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class PromptCancelledError extends ScaffoldError {
  constructor() {
    super("Aborted.");
  }
}
