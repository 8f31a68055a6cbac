import fs from "fs";
import path from "path";
import { z } from "zod";
import { initRepository } from "@core/git";
import { GITIGNORE_CONTENT } from "@core/templates";
import { definePlugin, succeeded } from "../../types/plugin";
import { CloudCodeBasePlugin } from "./cloud";
import { DocsPlugin } from "./docs";
import { EditorPlugin } from "./editor";
import { FormattersPlugin } from "./formatters";
import { PreCommitPlugin } from "./pre-commit";
import { ReadMePlugin } from "./readme";
import { SpellCheckerPlugin } from "./spell-checker";
import { StaticCheckersPlugin } from "./static-checkers";
import { TestsPlugin } from "./tests";

/**
 * Writes .gitignore and commits the scaffold. Depends on every file-writing
 * plugin so the initial commit sees the finished tree. A failing git step is
 * reported as a warning; the scaffold itself is already complete.
 */
export const VcsPlugin = definePlugin({
  name: "vcs",
  description: ".gitignore and initial git commit",
  dependencies: [
    ReadMePlugin,
    TestsPlugin,
    PreCommitPlugin,
    StaticCheckersPlugin,
    FormattersPlugin,
    SpellCheckerPlugin,
    EditorPlugin,
    DocsPlugin,
    CloudCodeBasePlugin,
  ],
  schema: z.object({ initGit: z.boolean() }),
  configure: (project) => ({ initGit: project.initGit }),
  build(base, config) {
    fs.writeFileSync(path.join(base.projectRoot, ".gitignore"), GITIGNORE_CONTENT, "utf8");
    if (!config.initGit) return succeeded();

    const error = initRepository(base.projectRoot);
    if (error) {
      return succeeded([`Failed to initialize git repository: ${error.message}`]);
    }
    return succeeded();
  },
});
