import path from "path";
import { logWarn } from "@cli/utils/logger";
import { BaseConfigSchema, type BaseConfig, type ProjectConfig, type UserConfig } from "../types/config";
import type { ScaffoldPlugin } from "../types/plugin";
import { ConfigValidationError } from "./errors";
import { PluginDependencyGraph } from "./graph";

export interface ScaffoldReport {
  order: string[];
  warnings: string[];
}

interface PreparedPlugin {
  plugin: ScaffoldPlugin;
  config: unknown;
}

export function resolveBuildOrder(plugins: readonly ScaffoldPlugin[]): ScaffoldPlugin[] {
  const graph = new PluginDependencyGraph<ScaffoldPlugin>();
  for (const plugin of plugins) graph.addPlugin(plugin);
  return graph.getBuildOrder();
}

export function createBaseConfig(cwd: string, projectName: string, userConfig: UserConfig): BaseConfig {
  const name = projectName.trim();
  const parsed = BaseConfigSchema.safeParse({
    projectRoot: path.resolve(cwd, name),
    projectName: name,
    userConfig,
  });
  if (!parsed.success) {
    throw new ConfigValidationError("base configuration", parsed.error.issues.map((i) => i.message));
  }
  return Object.freeze({ ...parsed.data, userConfig: Object.freeze({ ...parsed.data.userConfig }) });
}

function preparePlugins(order: ScaffoldPlugin[], project: ProjectConfig): PreparedPlugin[] {
  const issues: string[] = [];
  const prepared: PreparedPlugin[] = [];
  for (const plugin of order) {
    const parsed = plugin.schema.safeParse(plugin.configure(project));
    if (parsed.success) {
      prepared.push({ plugin, config: parsed.data });
    } else {
      for (const issue of parsed.error.issues) {
        const where = issue.path.length > 0 ? `.${issue.path.join(".")}` : "";
        issues.push(`${plugin.name}${where}: ${issue.message}`);
      }
    }
  }
  if (issues.length > 0) throw new ConfigValidationError("plugin configuration", issues);
  return prepared;
}

/**
 * Run `plugins` (and everything they depend on) one after another in
 * dependency order. The order and every plugin payload are settled before the
 * first file is written; the first failing plugin aborts the run and nothing
 * already written is rolled back.
 */
export function runScaffold(
  base: BaseConfig,
  project: ProjectConfig,
  plugins: readonly ScaffoldPlugin[]
): ScaffoldReport {
  const order = resolveBuildOrder(plugins);
  const prepared = preparePlugins(order, project);

  const warnings: string[] = [];
  for (const { plugin, config } of prepared) {
    const outcome = plugin.build(base, config);
    if (!outcome.ok) throw outcome.error;
    for (const warning of outcome.warnings) {
      logWarn(warning);
      warnings.push(warning);
    }
  }

  return { order: order.map((plugin) => plugin.name), warnings };
}
