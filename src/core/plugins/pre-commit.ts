import fs from "fs";
import path from "path";
import { z } from "zod";
import { PRE_COMMIT_CONTENT } from "@core/templates";
import { definePlugin, succeeded } from "../../types/plugin";
import { CorePlugin } from "./core";

export const PreCommitPlugin = definePlugin({
  name: "pre-commit",
  description: ".pre-commit-config.yaml",
  dependencies: [CorePlugin],
  schema: z.object({ enabled: z.boolean() }),
  configure: (project) => ({ enabled: project.preCommit }),
  build(base, config) {
    if (config.enabled) {
      fs.writeFileSync(path.join(base.projectRoot, ".pre-commit-config.yaml"), PRE_COMMIT_CONTENT, "utf8");
    }
    return succeeded();
  },
});
