import fs from "fs";
import path from "path";
import { z } from "zod";
import { README_FNAME } from "@core/consts";
import { buildReadme } from "@core/templates";
import { definePlugin, succeeded } from "../../types/plugin";
import { CorePlugin } from "./core";

export const ReadMePlugin = definePlugin({
  name: "readme",
  description: "README with next steps",
  dependencies: [CorePlugin],
  schema: z.object({}),
  configure: () => ({}),
  build(base) {
    fs.writeFileSync(path.join(base.projectRoot, README_FNAME), buildReadme(base.projectName), "utf8");
    return succeeded();
  },
});
