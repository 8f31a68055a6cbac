import { Command } from "commander";
import { logFailure } from "./utils/logger.js";
import { runCreateCommand } from "./commands/create.js";
import { runDumpConfigCommand } from "./commands/dump-config.js";
import { runPluginsCommand } from "./commands/plugins.js";

function fail(message: string, err: unknown): never {
  logFailure(message, err);
  process.exit(1);
}

const program = new Command();

program
  .name("pyscaff")
  .description("Scaffold a new Python project")
  .version("0.1.0");

program
  .command("create", { isDefault: true })
  .description("Create a new project directory")
  .argument("[project-name]", "The name of the project to be created")
  .option("-s, --skip-config", "Skip the configuration process and reuse the saved configuration")
  .action(async (projectName: string | undefined, options: { skipConfig?: boolean }) => {
    try {
      await runCreateCommand({ projectName, skipConfig: !!options.skipConfig });
    } catch (err) {
      fail("Failed to create project", err);
    }
  });

program
  .command("dump-config")
  .description("Write the default configuration and its JSON schema")
  .argument("[dir]", "Target folder (defaults to the app-data folder)")
  .action((dir: string | undefined) => {
    try {
      runDumpConfigCommand({ dir });
    } catch (err) {
      fail("Failed to write configuration", err);
    }
  });

program
  .command("plugins")
  .description("Show the resolved plugin build order")
  .option("--json", "Output as JSON")
  .action((options: { json?: boolean }) => {
    try {
      runPluginsCommand({ json: !!options.json });
    } catch (err) {
      fail("Failed to resolve plugin order", err);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => fail("Unexpected error", err));
