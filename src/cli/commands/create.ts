/**
{
  "description": "Default command. Loads or collects the user and project configuration, persists it when asked to, then runs every built-in plugin in dependency order under cwd/<project-name>.",
  "phase": 1
}
*/

import { logInfo, logSuccess, logWarn } from "@cli/utils/logger";
import {
  configFilePath,
  ensureConfigDir,
  dumpConfigSchema,
  getConfigDir,
  loadStoredConfig,
  saveStoredConfig,
  writeWorkspaceFile,
} from "@cli/utils/config";
import { confirmPrompt, promptProjectConfig, promptProjectName, promptUserConfig } from "@cli/utils/prompts";
import { readGitUserConfig } from "@core/git";
import { BUILTIN_PLUGINS } from "@core/plugins";
import { createBaseConfig, runScaffold, type ScaffoldReport } from "@core/scaffold";
import type { ProjectConfig, UserConfig } from "../../types/config";

interface CreateOptions {
  projectName?: string;
  skipConfig?: boolean;
  cwd?: string;
  configDir?: string;
}

function sameUser(a: UserConfig, b: UserConfig): boolean {
  return a.author === b.author && a.authorEmail === b.authorEmail;
}

export function scaffoldProject(cwd: string, userConfig: UserConfig, projectConfig: ProjectConfig): ScaffoldReport {
  logInfo("Building your project...");
  const base = createBaseConfig(cwd, projectConfig.projectName, userConfig);
  const report = runScaffold(base, projectConfig, BUILTIN_PLUGINS);
  logSuccess(`Project ${base.projectName} created at ${base.projectRoot}.`);
  return report;
}

export async function runCreateCommand(options: CreateOptions = {}): Promise<ScaffoldReport> {
  const cwd = options.cwd ?? process.cwd();
  const configDir = options.configDir ?? getConfigDir();
  const configFile = configFilePath(configDir);
  ensureConfigDir(configDir);

  const gitUser = readGitUserConfig();
  let userConfig: UserConfig;
  let projectConfig: ProjectConfig;
  let updateNeeded = false;

  logInfo(`Trying to load config file from ${configFile}...`);
  const loaded = loadStoredConfig(configFile);

  if (loaded.status === "ok") {
    userConfig = loaded.config.userConfig;
    projectConfig = loaded.config.projectConfig;
    logInfo(`Welcome back ${userConfig.author}!`);

    if (gitUser && !sameUser(userConfig, gitUser)) {
      logWarn("Looks like your git user configuration is different from your saved configuration.");
      const switchUser = await confirmPrompt(
        `Would you like to update your user configuration to ${gitUser.author} with ${gitUser.authorEmail}?`
      );
      if (switchUser) {
        userConfig = gitUser;
        updateNeeded = true;
      }
    }

    if (options.skipConfig) {
      logInfo("Skipping configuration process.");
      projectConfig = { ...projectConfig, projectName: options.projectName ?? (await promptProjectName()) };
    } else if (await confirmPrompt("Would you like to use your previous configuration?")) {
      projectConfig = { ...projectConfig, projectName: options.projectName ?? (await promptProjectName()) };
    } else {
      logInfo("No problem! Let's update your configuration.");
      projectConfig = await promptProjectConfig(options.projectName);
      updateNeeded = await confirmPrompt("Would you like to save this configuration for future use?");
    }
  } else {
    if (loaded.status === "missing") {
      logInfo("Looks like you're running this tool for the first time.");
    } else {
      logWarn("Looks like your configuration file is corrupt. Let's set up your configuration again.");
    }
    userConfig = await promptUserConfig(gitUser);
    projectConfig = await promptProjectConfig(options.projectName);
    updateNeeded = true;
  }

  if (updateNeeded) {
    saveStoredConfig(configFile, { userConfig, projectConfig });
    logSuccess(`Configuration saved at ${configFile}.`);
    dumpConfigSchema(configDir);
    writeWorkspaceFile(configDir);
  }

  return scaffoldProject(cwd, userConfig, projectConfig);
}
