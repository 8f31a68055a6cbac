import fs from "fs";
import path from "path";
import { z } from "zod";
import { buildCodeWorkspace } from "@core/templates";
import { definePlugin, succeeded } from "../../types/plugin";
import { CorePlugin } from "./core";

export const EditorPlugin = definePlugin({
  name: "editor",
  description: "VS Code workspace file",
  dependencies: [CorePlugin],
  schema: z.object({ codeEditor: z.enum(["vscode"]).nullable() }),
  configure: (project) => ({ codeEditor: project.codeEditor }),
  build(base, config) {
    if (config.codeEditor === "vscode") {
      const file = path.join(base.projectRoot, `${base.projectName}.code-workspace`);
      fs.writeFileSync(file, `${JSON.stringify(buildCodeWorkspace(), null, 2)}\n`, "utf8");
    }
    return succeeded();
  },
});
