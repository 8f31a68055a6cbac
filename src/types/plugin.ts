import type { z } from "zod";
import type { ScaffoldError } from "@core/errors";
import type { BaseConfig, ProjectConfig } from "./config";

export type PluginOutcome =
  | { ok: true; warnings: string[] }
  | { ok: false; error: ScaffoldError };

/**
 * A configuration-file generator. `schema` describes the payload `build`
 * receives; `configure` picks that payload out of the project configuration
 * and the orchestrator validates it before any plugin runs.
 */
export interface ScaffoldPlugin<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  dependencies: readonly ScaffoldPlugin[];
  schema: TSchema;
  configure(project: ProjectConfig): z.input<TSchema>;
  build(base: BaseConfig, config: z.output<TSchema>): PluginOutcome;
}

export function definePlugin<TSchema extends z.ZodTypeAny>(
  plugin: ScaffoldPlugin<TSchema>
): ScaffoldPlugin<TSchema> {
  return plugin;
}

export function succeeded(warnings: string[] = []): PluginOutcome {
  return { ok: true, warnings };
}

export function failed(error: ScaffoldError): PluginOutcome {
  return { ok: false, error };
}
