import fs from "fs";
import path from "path";
import { z } from "zod";
import {
  buildMkDocsConfig,
  buildSphinxConf,
  buildSphinxIndex,
  MKDOCS_INDEX_CONTENT,
} from "@core/templates";
import { DOCS_GENERATORS } from "../../types/config";
import { definePlugin, succeeded } from "../../types/plugin";
import { CorePlugin } from "./core";

export const DocsPlugin = definePlugin({
  name: "docs",
  description: "mkdocs or sphinx skeleton",
  dependencies: [CorePlugin],
  schema: z.object({ docs: z.enum(DOCS_GENERATORS).nullable() }),
  configure: (project) => ({ docs: project.docs }),
  build(base, config) {
    if (!config.docs) return succeeded();

    const root = base.projectRoot;
    const docsFolder = path.join(root, "docs");
    fs.mkdirSync(docsFolder, { recursive: true });

    if (config.docs === "mkdocs") {
      fs.writeFileSync(path.join(root, "mkdocs.yml"), buildMkDocsConfig(base.projectName), "utf8");
      fs.writeFileSync(path.join(docsFolder, "index.md"), MKDOCS_INDEX_CONTENT, "utf8");
    } else {
      fs.writeFileSync(
        path.join(docsFolder, "conf.py"),
        buildSphinxConf(base.projectName, base.userConfig.author),
        "utf8"
      );
      fs.writeFileSync(path.join(docsFolder, "index.rst"), buildSphinxIndex(base.projectName), "utf8");
    }
    return succeeded();
  },
});
