import fs from "fs";
import path from "path";
import { z } from "zod";
import { buildGhActionCi, buildGhActionRelease } from "@core/templates";
import { PYTHON_VERSIONS } from "../../types/config";
import { definePlugin, succeeded } from "../../types/plugin";
import { CorePlugin } from "./core";

export const CloudCodeBasePlugin = definePlugin({
  name: "cloud-code-base",
  description: "GitHub Actions CI and release workflows",
  dependencies: [CorePlugin],
  schema: z.object({
    cloudCodeBase: z.enum(["github"]).nullable(),
    minPyVersion: z.enum(PYTHON_VERSIONS),
  }),
  configure: (project) => ({
    cloudCodeBase: project.cloudCodeBase,
    minPyVersion: project.minPyVersion,
  }),
  build(base, config) {
    if (config.cloudCodeBase !== "github") return succeeded();

    const workflows = path.join(base.projectRoot, ".github", "workflows");
    fs.mkdirSync(workflows, { recursive: true });
    fs.writeFileSync(path.join(workflows, "ci.yml"), buildGhActionCi(config.minPyVersion), "utf8");
    fs.writeFileSync(path.join(workflows, "release.yml"), buildGhActionRelease(base.projectName), "utf8");
    return succeeded();
  },
});
