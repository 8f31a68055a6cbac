import { logInfo } from "@cli/utils/logger";
import { BUILTIN_PLUGINS } from "@core/plugins";
import { resolveBuildOrder } from "@core/scaffold";

interface PluginsOptions {
  json?: boolean;
}

export interface PluginSummary {
  name: string;
  description: string;
  dependencies: string[];
}

export function summarizeBuildOrder(): PluginSummary[] {
  return resolveBuildOrder(BUILTIN_PLUGINS).map((plugin) => ({
    name: plugin.name,
    description: plugin.description,
    dependencies: plugin.dependencies.map((dep) => dep.name),
  }));
}

export function runPluginsCommand(options: PluginsOptions = {}) {
  const summary = summarizeBuildOrder();

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }

  logInfo("Plugin build order");
  summary.forEach((entry, index) => {
    const deps = entry.dependencies.length > 0 ? ` (after ${entry.dependencies.join(", ")})` : "";
    console.log(` ${String(index + 1).padStart(2)}. ${entry.name}: ${entry.description}${deps}`);
  });
}
