export * from "./types";
export { PluginDependencyGraph, type DependencyNode } from "./core/graph";
export {
  ScaffoldError,
  CycleDetectedError,
  DuplicatePluginError,
  PreconditionFailedError,
  ExternalToolError,
  ConfigValidationError,
  PromptCancelledError,
} from "./core/errors";
export { createBaseConfig, resolveBuildOrder, runScaffold, type ScaffoldReport } from "./core/scaffold";
export * from "./core/plugins";
