import { readFileSync } from "fs";
import { resolve } from "path";
import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const root = fileURLToPath(new URL(".", import.meta.url));

interface TsConfigPaths {
  compilerOptions?: { baseUrl?: string; paths?: Record<string, string[]> };
}

// "@core/*" -> src/core and friends, read from tsconfig paths.
function aliasesFromTsConfig(): Record<string, string> {
  const { compilerOptions = {} }: TsConfigPaths = JSON.parse(readFileSync(resolve(root, "tsconfig.json"), "utf8"));
  const baseDir = resolve(root, compilerOptions.baseUrl ?? ".");
  return Object.fromEntries(
    Object.entries(compilerOptions.paths ?? {}).flatMap(([key, [target]]): Array<[string, string]> =>
      target ? [[key.replace(/\/\*$/, ""), resolve(baseDir, target.replace(/\/\*$/, ""))]] : []
    )
  );
}

export default defineConfig({
  resolve: { alias: aliasesFromTsConfig() },
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    clearMocks: true,
  },
});
