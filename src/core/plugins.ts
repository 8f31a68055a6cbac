import type { ScaffoldPlugin } from "../types/plugin";
import { CloudCodeBasePlugin } from "./plugins/cloud";
import { CorePlugin } from "./plugins/core";
import { DocsPlugin } from "./plugins/docs";
import { EditorPlugin } from "./plugins/editor";
import { FormattersPlugin } from "./plugins/formatters";
import { PreCommitPlugin } from "./plugins/pre-commit";
import { PyProjectTomlPlugin } from "./plugins/pyproject";
import { ReadMePlugin } from "./plugins/readme";
import { SpellCheckerPlugin } from "./plugins/spell-checker";
import { StaticCheckersPlugin } from "./plugins/static-checkers";
import { TestsPlugin } from "./plugins/tests";
import { VcsPlugin } from "./plugins/vcs";

export {
  CloudCodeBasePlugin,
  CorePlugin,
  DocsPlugin,
  EditorPlugin,
  FormattersPlugin,
  PreCommitPlugin,
  PyProjectTomlPlugin,
  ReadMePlugin,
  SpellCheckerPlugin,
  StaticCheckersPlugin,
  TestsPlugin,
  VcsPlugin,
};

/** Built-in plugins in registration order; ties in the build order follow this list. */
export const BUILTIN_PLUGINS: readonly ScaffoldPlugin[] = [
  CorePlugin,
  ReadMePlugin,
  PyProjectTomlPlugin,
  TestsPlugin,
  PreCommitPlugin,
  StaticCheckersPlugin,
  FormattersPlugin,
  SpellCheckerPlugin,
  EditorPlugin,
  DocsPlugin,
  CloudCodeBasePlugin,
  VcsPlugin,
];
