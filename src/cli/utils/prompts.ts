import { cancel, confirm, isCancel, log, multiselect, select, text } from "@clack/prompts";
import { PromptCancelledError } from "@core/errors";
import {
  createDefaultProjectConfig,
  type BuildBackend,
  type DocsGenerator,
  type Formatter,
  type ProjectConfig,
  type PythonVersion,
  type SpellChecker,
  type StaticCodeChecker,
  type UserConfig,
} from "../../types/config";

function bailIfCancelled<T>(value: T): asserts value is Exclude<T, symbol> {
  if (isCancel(value)) {
    cancel("Aborted.");
    throw new PromptCancelledError();
  }
}

function required(label: string) {
  return (value: string) => (value.trim() ? undefined : `${label} cannot be empty.`);
}

async function askText(message: string, label: string, placeholder?: string): Promise<string> {
  const value = await text({ message, placeholder, validate: required(label) });
  bailIfCancelled(value);
  return value.trim();
}

export async function confirmPrompt(message: string, initialValue = true): Promise<boolean> {
  const value = await confirm({ message, initialValue });
  bailIfCancelled(value);
  return value;
}

export async function promptUserConfig(gitUser: UserConfig | null): Promise<UserConfig> {
  if (gitUser) {
    log.success(
      `Good news ${gitUser.author}! We found your git user configuration with email ${gitUser.authorEmail}.`
    );
    return gitUser;
  }
  log.info("We could not find your git user configuration. Let's set up your user configuration.");
  const author = await askText("What's your name:", "Author name");
  const authorEmail = await askText("What's your email address:", "Author email");
  return { author, authorEmail };
}

export async function promptProjectName(): Promise<string> {
  return askText("What's your python project name:", "Project name", "my-project");
}

export async function promptProjectConfig(projectName?: string): Promise<ProjectConfig> {
  const config = createDefaultProjectConfig(projectName ?? (await promptProjectName()));

  const useDefault = await confirmPrompt("Would you like to use the default configuration?");
  if (useDefault) return config;

  const pkgLicense = await select<ProjectConfig["pkgLicense"]>({
    message: "Select a license for your package:",
    options: [
      { value: "MIT", label: "MIT" },
      { value: "Apache", label: "Apache 2.0" },
      { value: "BSD", label: "BSD 3-Clause" },
      { value: "GPL", label: "GPL v3 or later" },
      { value: "Proprietary", label: "Proprietary" },
    ],
    initialValue: config.pkgLicense,
  });
  bailIfCancelled(pkgLicense);
  config.pkgLicense = pkgLicense;

  const minPyVersion = await select<PythonVersion>({
    message: "Select the minimum python version for your project:",
    options: [
      { value: "3.10", label: "3.10" },
      { value: "3.11", label: "3.11" },
      { value: "3.12", label: "3.12" },
      { value: "3.13", label: "3.13" },
    ],
    initialValue: config.minPyVersion,
  });
  bailIfCancelled(minPyVersion);
  config.minPyVersion = minPyVersion;

  const layout = await select<ProjectConfig["layout"]>({
    message: "Select a layout for your project:",
    options: [
      { value: "src", label: "src", hint: "src/<package>" },
      { value: "flat", label: "flat", hint: "<package> at the root" },
    ],
    initialValue: config.layout,
  });
  bailIfCancelled(layout);
  config.layout = layout;

  const buildBackend = await select<BuildBackend | null>({
    message: "Select a build-backend for your package:",
    options: [
      { value: "Hatchling", label: "Hatchling", hint: "https://pypi.org/project/hatchling/" },
      { value: "Setuptools", label: "Setuptools", hint: "https://setuptools.pypa.io/" },
      { value: "Poetry-core", label: "Poetry-core", hint: "https://pypi.org/project/poetry-core/" },
      { value: "PDM-backend", label: "PDM-backend", hint: "https://backend.pdm-project.org/" },
      { value: "Flit-core", label: "Flit-core", hint: "https://flit.pypa.io/" },
      { value: null, label: "No build-backend", hint: "the project is not distributed as a package" },
    ],
    initialValue: config.buildBackend,
  });
  bailIfCancelled(buildBackend);
  config.buildBackend = buildBackend;

  config.dynamicVersion = await confirmPrompt("Derive the package version from git tags?", false);

  const preference = await select<ProjectConfig["configurationPreference"]>({
    message: "Where should tool settings live?",
    options: [
      { value: "pyproject_toml", label: "pyproject.toml", hint: "one [tool.*] table per tool" },
      { value: "stand_alone", label: "Stand-alone files", hint: ".mypy.ini, ruff.toml, ..." },
    ],
    initialValue: config.configurationPreference,
  });
  bailIfCancelled(preference);
  config.configurationPreference = preference;

  const checkers = await multiselect<StaticCodeChecker>({
    message: "Select static code checkers for your project:",
    options: [
      { value: "flake8", label: "flake8", hint: "https://flake8.pycqa.org/" },
      { value: "mypy", label: "mypy", hint: "https://mypy-lang.org/" },
      { value: "pyright", label: "pyright", hint: "https://github.com/microsoft/pyright" },
      { value: "pylint", label: "pylint", hint: "https://www.pylint.org/" },
    ],
    initialValues: config.staticCodeCheckers,
    required: false,
  });
  bailIfCancelled(checkers);
  config.staticCodeCheckers = checkers;

  const formatters = await multiselect<Formatter>({
    message: "Select formatters for your project:",
    options: [
      { value: "ruff", label: "ruff", hint: "https://docs.astral.sh/ruff/formatter/" },
      { value: "isort", label: "isort", hint: "https://pycqa.github.io/isort/" },
      { value: "black", label: "black", hint: "https://black.readthedocs.io/" },
    ],
    initialValues: config.formatters,
    required: false,
  });
  bailIfCancelled(formatters);
  config.formatters = formatters;

  const spellChecker = await select<SpellChecker | null>({
    message: "Select a spell checker for your project:",
    options: [
      { value: "cspell", label: "cspell", hint: "https://cspell.org/" },
      { value: "codespell", label: "codespell", hint: "https://github.com/codespell-project/codespell" },
      { value: null, label: "No spell checker" },
    ],
    initialValue: config.spellChecker,
  });
  bailIfCancelled(spellChecker);
  config.spellChecker = spellChecker;

  const docs = await select<DocsGenerator | null>({
    message: "Select a documentation generator for your project:",
    options: [
      { value: "mkdocs", label: "mkdocs", hint: "https://www.mkdocs.org/" },
      { value: "sphinx", label: "sphinx", hint: "https://www.sphinx-doc.org/" },
      { value: null, label: "No documentation generator" },
    ],
    initialValue: config.docs,
  });
  bailIfCancelled(docs);
  config.docs = docs;

  const codeEditor = await select<"vscode" | null>({
    message: "Select a code editor for your project:",
    options: [
      { value: "vscode", label: "Visual Studio Code", hint: "https://code.visualstudio.com/" },
      { value: null, label: "No code editor" },
    ],
    initialValue: config.codeEditor,
  });
  bailIfCancelled(codeEditor);
  config.codeEditor = codeEditor;

  config.preCommit = await confirmPrompt("Do you want to generate a pre-commit configuration file?");

  const cloudCodeBase = await select<"github" | null>({
    message: "Select a cloud code base for your project:",
    options: [
      { value: "github", label: "GitHub", hint: "CI and release workflows" },
      { value: null, label: "No cloud code base" },
    ],
    initialValue: config.cloudCodeBase,
  });
  bailIfCancelled(cloudCodeBase);
  config.cloudCodeBase = cloudCodeBase;

  config.initGit = await confirmPrompt("Initialize a git repository with a first commit?");

  return config;
}
