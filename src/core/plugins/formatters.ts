import fs from "fs";
import path from "path";
import { z } from "zod";
import { DEFAULT_RULER_LEN } from "@core/consts";
import { updateToolTables, type TomlTable } from "@core/pyproject";
import { ISORT_CONFIG_CONTENT, RUFF_CONFIG_CONTENT } from "@core/templates";
import { FORMATTERS } from "../../types/config";
import { definePlugin, succeeded } from "../../types/plugin";
import { PyProjectTomlPlugin } from "./pyproject";

export const FormattersPlugin = definePlugin({
  name: "formatters",
  description: "ruff, isort and black settings",
  dependencies: [PyProjectTomlPlugin],
  schema: z.object({
    formatters: z.array(z.enum(FORMATTERS)),
    configurationPreference: z.enum(["stand_alone", "pyproject_toml"]),
  }),
  configure: (project) => ({
    formatters: project.formatters,
    configurationPreference: project.configurationPreference,
  }),
  build(base, config) {
    const root = base.projectRoot;
    const standAlone = config.configurationPreference === "stand_alone";
    const tables: TomlTable = {};

    if (config.formatters.includes("ruff")) {
      if (standAlone) {
        fs.writeFileSync(path.join(root, "ruff.toml"), RUFF_CONFIG_CONTENT, "utf8");
      } else {
        tables.ruff = {
          exclude: [],
          "line-length": DEFAULT_RULER_LEN,
          "indent-width": 4,
          lint: { ignore: [] },
          format: { "quote-style": "double", "indent-style": "space" },
        };
      }
    }

    if (config.formatters.includes("isort")) {
      if (standAlone) {
        fs.writeFileSync(path.join(root, ".isort.cfg"), ISORT_CONFIG_CONTENT, "utf8");
      } else {
        tables.isort = { profile: "black", line_length: DEFAULT_RULER_LEN };
      }
    }

    // black only reads pyproject.toml
    if (config.formatters.includes("black")) {
      tables.black = { "line-length": DEFAULT_RULER_LEN };
    }

    if (Object.keys(tables).length > 0) {
      updateToolTables(root, (tool) => Object.assign(tool, tables));
    }
    return succeeded();
  },
});
