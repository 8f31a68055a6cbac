import fs from "fs";
import path from "path";
import { z } from "zod";
import { updateToolTables, type TomlTable } from "@core/pyproject";
import { FLAKE8_CONFIG_CONTENT, MYPY_CONFIG_CONTENT, PYLINT_CONFIG_CONTENT } from "@core/templates";
import { PYTHON_VERSIONS, STATIC_CODE_CHECKERS } from "../../types/config";
import { definePlugin, succeeded } from "../../types/plugin";
import { PyProjectTomlPlugin } from "./pyproject";

export const StaticCheckersPlugin = definePlugin({
  name: "static-checkers",
  description: "flake8, mypy, pyright and pylint settings",
  dependencies: [PyProjectTomlPlugin],
  schema: z.object({
    checkers: z.array(z.enum(STATIC_CODE_CHECKERS)),
    configurationPreference: z.enum(["stand_alone", "pyproject_toml"]),
    minPyVersion: z.enum(PYTHON_VERSIONS),
  }),
  configure: (project) => ({
    checkers: project.staticCodeCheckers,
    configurationPreference: project.configurationPreference,
    minPyVersion: project.minPyVersion,
  }),
  build(base, config) {
    const root = base.projectRoot;
    const standAlone = config.configurationPreference === "stand_alone";
    const tables: TomlTable = {};
    const write = (file: string, contents: string) =>
      fs.writeFileSync(path.join(root, file), contents, "utf8");

    // flake8 cannot read pyproject.toml
    if (config.checkers.includes("flake8")) write(".flake8", FLAKE8_CONFIG_CONTENT);

    if (config.checkers.includes("mypy")) {
      if (standAlone) write(".mypy.ini", MYPY_CONFIG_CONTENT);
      else tables.mypy = { python_version: config.minPyVersion, exclude: [] };
    }

    if (config.checkers.includes("pyright")) {
      const pyright = { pythonVersion: config.minPyVersion };
      if (standAlone) write("pyrightconfig.json", `${JSON.stringify(pyright, null, 2)}\n`);
      else tables.pyright = pyright;
    }

    if (config.checkers.includes("pylint")) {
      if (standAlone) write(".pylintrc", PYLINT_CONFIG_CONTENT);
      else tables.pylint = { "messages control": { disable: [] } };
    }

    if (Object.keys(tables).length > 0) {
      updateToolTables(root, (tool) => Object.assign(tool, tables));
    }
    return succeeded();
  },
});
