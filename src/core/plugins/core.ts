import fs from "fs";
import path from "path";
import { z } from "zod";
import { PreconditionFailedError } from "@core/errors";
import { definePlugin, failed, succeeded } from "../../types/plugin";

/** Python import name for a distribution name (`my-project` -> `my_project`). */
export function moduleName(projectName: string): string {
  return projectName.replace(/-/g, "_");
}

/** Why `root` cannot hold a new project, or null when it is missing or an empty directory. */
function blockedReason(root: string): string | null {
  if (!fs.existsSync(root)) return null;
  if (!fs.statSync(root).isDirectory()) return `${root} already exists and is not a directory.`;
  if (fs.readdirSync(root).length > 0) return `Project directory ${root} already exists and is not empty.`;
  return null;
}

export const CorePlugin = definePlugin({
  name: "core",
  description: "Project root and package folder",
  dependencies: [],
  schema: z.object({
    layout: z.enum(["src", "flat"]),
  }),
  configure: (project) => ({ layout: project.layout }),
  build(base, config) {
    const root = base.projectRoot;
    const blocked = blockedReason(root);
    if (blocked) return failed(new PreconditionFailedError("core", blocked));

    const pkg = moduleName(base.projectName);
    const srcFolder = config.layout === "flat" ? path.join(root, pkg) : path.join(root, "src", pkg);
    fs.mkdirSync(srcFolder, { recursive: true });
    fs.writeFileSync(path.join(srcFolder, "__init__.py"), "", "utf8");
    return succeeded();
  },
});
