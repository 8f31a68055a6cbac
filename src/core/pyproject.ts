import fs from "fs";
import path from "path";
import { parse, stringify } from "smol-toml";
import { PYPROJECT_TOML_FNAME } from "./consts";

export type TomlTable = Record<string, unknown>;

export function isTable(value: unknown): value is TomlTable {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export function pyprojectPath(projectRoot: string): string {
  return path.join(projectRoot, PYPROJECT_TOML_FNAME);
}

export function readPyProject(projectRoot: string): TomlTable {
  return parse(fs.readFileSync(pyprojectPath(projectRoot), "utf8"));
}

export function writePyProject(projectRoot: string, doc: TomlTable) {
  fs.writeFileSync(pyprojectPath(projectRoot), stringify(doc), "utf8");
}

/** Read pyproject.toml, let `mutate` edit its `[tool]` table, and write it back. */
export function updateToolTables(projectRoot: string, mutate: (tool: TomlTable) => void) {
  const doc = readPyProject(projectRoot);
  const tool = isTable(doc.tool) ? doc.tool : {};
  mutate(tool);
  doc.tool = tool;
  writePyProject(projectRoot, doc);
}
