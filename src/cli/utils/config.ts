import fs from "fs";
import os from "os";
import path from "path";
import JSON5 from "json5";
import { zodToJsonSchema } from "zod-to-json-schema";
import { CONFIG_FNAME, CONFIG_SCHEMA_FNAME, TOOL_NAME, WORKSPACE_FNAME } from "@core/consts";
import { ScaffoldError } from "@core/errors";
import { StoredConfigSchema, type StoredConfig } from "../../types/config";

export type LoadedConfig =
  | { status: "missing" }
  | { status: "invalid"; error: unknown }
  | { status: "ok"; config: StoredConfig };

interface AppDataEnv {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  homedir?: string;
}

/** Per-user application data root: APPDATA when set, otherwise the platform default. */
export function getAppDataPath(options: AppDataEnv = {}): string {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const home = options.homedir ?? os.homedir();

  if (env.APPDATA) return env.APPDATA;
  if (platform === "win32") {
    throw new ScaffoldError("APPDATA environment variable is not set.");
  }
  if (platform === "darwin") return path.join(home, "Library", "Application Support");
  return path.join(home, ".config");
}

export function getConfigDir(options: AppDataEnv = {}): string {
  return path.join(getAppDataPath(options), TOOL_NAME);
}

export function ensureConfigDir(dir: string) {
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

export function configFilePath(dir: string): string {
  return path.join(dir, CONFIG_FNAME);
}

export function loadStoredConfig(file: string): LoadedConfig {
  if (!fs.existsSync(file)) return { status: "missing" };
  try {
    const raw: unknown = JSON5.parse(fs.readFileSync(file, "utf8"));
    const parsed = StoredConfigSchema.safeParse(raw);
    if (!parsed.success) return { status: "invalid", error: parsed.error };
    return { status: "ok", config: parsed.data };
  } catch (err) {
    return { status: "invalid", error: err };
  }
}

export function saveStoredConfig(file: string, config: StoredConfig) {
  ensureConfigDir(path.dirname(file));
  fs.writeFileSync(file, `${JSON5.stringify(config, null, 2)}\n`, "utf8");
}

export function dumpConfigSchema(dir: string): string {
  ensureConfigDir(dir);
  const file = path.join(dir, CONFIG_SCHEMA_FNAME);
  const schema = zodToJsonSchema(StoredConfigSchema, "StoredConfig");
  fs.writeFileSync(file, `${JSON.stringify(schema, null, 2)}\n`, "utf8");
  return file;
}

/** Workspace for editing the stored config with schema completion. */
export function writeWorkspaceFile(dir: string): string {
  ensureConfigDir(dir);
  const file = path.join(dir, WORKSPACE_FNAME);
  const workspace = {
    folders: [{ path: "." }],
    settings: {
      "json.schemas": [
        {
          fileMatch: [CONFIG_FNAME],
          url: `./${CONFIG_SCHEMA_FNAME}`,
        },
      ],
      "files.associations": { [CONFIG_FNAME]: "jsonc" },
    },
  };
  fs.writeFileSync(file, `${JSON.stringify(workspace, null, 2)}\n`, "utf8");
  return file;
}
