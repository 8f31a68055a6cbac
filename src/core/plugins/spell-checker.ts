import fs from "fs";
import path from "path";
import { z } from "zod";
import { updateToolTables } from "@core/pyproject";
import { buildCspellConfig, CODESPELL_CONFIG_CONTENT } from "@core/templates";
import { SPELL_CHECKERS } from "../../types/config";
import { definePlugin, succeeded } from "../../types/plugin";
import { moduleName } from "./core";
import { PyProjectTomlPlugin } from "./pyproject";

export const SpellCheckerPlugin = definePlugin({
  name: "spell-checker",
  description: "cspell or codespell settings",
  dependencies: [PyProjectTomlPlugin],
  schema: z.object({
    spellChecker: z.enum(SPELL_CHECKERS).nullable(),
    configurationPreference: z.enum(["stand_alone", "pyproject_toml"]),
  }),
  configure: (project) => ({
    spellChecker: project.spellChecker,
    configurationPreference: project.configurationPreference,
  }),
  build(base, config) {
    const root = base.projectRoot;
    if (config.spellChecker === "cspell") {
      const words = Array.from(new Set([base.projectName, moduleName(base.projectName)]));
      fs.writeFileSync(
        path.join(root, "cspell.json"),
        `${JSON.stringify(buildCspellConfig(words), null, 2)}\n`,
        "utf8"
      );
    } else if (config.spellChecker === "codespell") {
      if (config.configurationPreference === "stand_alone") {
        fs.writeFileSync(path.join(root, ".codespellrc"), CODESPELL_CONFIG_CONTENT, "utf8");
      } else {
        updateToolTables(root, (tool) => {
          tool.codespell = { skip: ".git,*.lock,.venv" };
        });
      }
    }
    return succeeded();
  },
});
