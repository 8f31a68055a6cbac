import fs from "fs";
import path from "path";
import { z } from "zod";
import { updateToolTables } from "@core/pyproject";
import { PYTEST_ADDOPTS, PYTEST_CONFIG_CONTENT } from "@core/templates";
import { definePlugin, succeeded } from "../../types/plugin";
import { PyProjectTomlPlugin } from "./pyproject";

export const TestsPlugin = definePlugin({
  name: "tests",
  description: "tests package and pytest settings",
  dependencies: [PyProjectTomlPlugin],
  schema: z.object({
    configurationPreference: z.enum(["stand_alone", "pyproject_toml"]),
  }),
  configure: (project) => ({ configurationPreference: project.configurationPreference }),
  build(base, config) {
    const root = base.projectRoot;
    const testsFolder = path.join(root, "tests");
    fs.mkdirSync(testsFolder, { recursive: true });
    fs.writeFileSync(path.join(testsFolder, "__init__.py"), "", "utf8");

    if (config.configurationPreference === "stand_alone") {
      fs.writeFileSync(path.join(root, "pytest.ini"), PYTEST_CONFIG_CONTENT, "utf8");
    } else {
      updateToolTables(root, (tool) => {
        tool.pytest = { ini_options: { addopts: PYTEST_ADDOPTS } };
      });
    }
    return succeeded();
  },
});
