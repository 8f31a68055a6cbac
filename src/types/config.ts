import { z } from "zod";

export const LICENSES = ["MIT", "GPL", "Apache", "BSD", "Proprietary"] as const;
export const PYTHON_VERSIONS = ["3.10", "3.11", "3.12", "3.13"] as const;
export const BUILD_BACKENDS = ["Hatchling", "Setuptools", "Poetry-core", "PDM-backend", "Flit-core"] as const;
export const STATIC_CODE_CHECKERS = ["flake8", "mypy", "pyright", "pylint"] as const;
export const FORMATTERS = ["ruff", "isort", "black"] as const;
export const SPELL_CHECKERS = ["cspell", "codespell"] as const;
export const DOCS_GENERATORS = ["mkdocs", "sphinx"] as const;

export const UserConfigSchema = z.object({
  author: z.string().trim().min(1, "author cannot be empty"),
  authorEmail: z.string().trim().min(1, "author email cannot be empty"),
});

export const ProjectConfigSchema = z.object({
  projectName: z.string(),
  pkgLicense: z.enum(LICENSES),
  minPyVersion: z.enum(PYTHON_VERSIONS),
  layout: z.enum(["src", "flat"]),
  buildBackend: z.enum(BUILD_BACKENDS).nullable(),
  /** Derive the package version from git tags instead of a static field. */
  dynamicVersion: z.boolean(),
  /** Where tool settings live: their own files, or tables inside pyproject.toml. */
  configurationPreference: z.enum(["stand_alone", "pyproject_toml"]),
  staticCodeCheckers: z.array(z.enum(STATIC_CODE_CHECKERS)),
  formatters: z.array(z.enum(FORMATTERS)),
  spellChecker: z.enum(SPELL_CHECKERS).nullable(),
  docs: z.enum(DOCS_GENERATORS).nullable(),
  codeEditor: z.enum(["vscode"]).nullable(),
  preCommit: z.boolean(),
  cloudCodeBase: z.enum(["github"]).nullable(),
  initGit: z.boolean(),
});

/** Shape of the JSON5 file persisted in the app-data folder. */
export const StoredConfigSchema = z.object({
  userConfig: UserConfigSchema,
  projectConfig: ProjectConfigSchema,
});

export const BaseConfigSchema = z.object({
  projectRoot: z.string().min(1),
  projectName: z.string().trim().min(1, "project name cannot be empty"),
  userConfig: UserConfigSchema,
});

export type UserConfig = z.infer<typeof UserConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type StoredConfig = z.infer<typeof StoredConfigSchema>;
export type License = ProjectConfig["pkgLicense"];
export type PythonVersion = ProjectConfig["minPyVersion"];
export type BuildBackend = (typeof BUILD_BACKENDS)[number];
export type StaticCodeChecker = (typeof STATIC_CODE_CHECKERS)[number];
export type Formatter = (typeof FORMATTERS)[number];
export type SpellChecker = (typeof SPELL_CHECKERS)[number];
export type DocsGenerator = (typeof DOCS_GENERATORS)[number];

/**
 * Shared, read-only context handed to every plugin. Built once per run by the
 * orchestrator and frozen before any plugin sees it.
 */
export type BaseConfig = Readonly<{
  projectRoot: string;
  projectName: string;
  userConfig: Readonly<UserConfig>;
}>;

/** Fresh defaults on every call; callers may mutate the returned object freely. */
export function createDefaultProjectConfig(projectName = ""): ProjectConfig {
  return {
    projectName,
    pkgLicense: "MIT",
    minPyVersion: "3.10",
    layout: "src",
    buildBackend: "Hatchling",
    dynamicVersion: false,
    configurationPreference: "pyproject_toml",
    staticCodeCheckers: ["flake8", "mypy", "pyright", "pylint"],
    formatters: ["ruff", "isort"],
    spellChecker: "cspell",
    docs: "mkdocs",
    codeEditor: "vscode",
    preCommit: true,
    cloudCodeBase: "github",
    initGit: true,
  };
}
