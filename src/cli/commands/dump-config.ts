import fs from "fs";
import path from "path";
import { logSuccess } from "@cli/utils/logger";
import { configFilePath, dumpConfigSchema, getConfigDir, saveStoredConfig } from "@cli/utils/config";
import { ScaffoldError } from "@core/errors";
import { createDefaultProjectConfig } from "../../types/config";

interface DumpConfigOptions {
  dir?: string;
}

/**
 * Write the default configuration and its JSON schema side by side.
 * An existing config file is never overwritten; the identity fields are left
 * empty, so `create` asks for them again when it loads the file.
 */
export function runDumpConfigCommand(options: DumpConfigOptions = {}) {
  const dir = path.resolve(options.dir ?? getConfigDir());
  const configFile = configFilePath(dir);
  if (fs.existsSync(configFile)) {
    throw new ScaffoldError(`${configFile} already exists. Remove it or pass another folder.`);
  }
  saveStoredConfig(configFile, {
    userConfig: { author: "", authorEmail: "" },
    projectConfig: createDefaultProjectConfig(),
  });
  const schemaFile = dumpConfigSchema(dir);
  logSuccess(`Default configuration written to ${configFile}.`);
  logSuccess(`Configuration schema written to ${schemaFile}.`);
  return { configFile, schemaFile };
}
