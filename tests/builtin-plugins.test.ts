import fs from "fs";
import os from "os";
import path from "path";
import { parse } from "smol-toml";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { ExternalToolError, PreconditionFailedError } from "../src/core/errors";
import { BUILTIN_PLUGINS } from "../src/core/plugins";
import { buildPyProjectDocument } from "../src/core/plugins/pyproject";
import { createBaseConfig, runScaffold } from "../src/core/scaffold";
import { createDefaultProjectConfig, type ProjectConfig } from "../src/types/config";

const git = vi.hoisted(() => ({
  initRepository: vi.fn<(cwd: string) => ExternalToolError | null>(() => null),
  readGitUserConfig: vi.fn(() => null),
}));

vi.mock("../src/core/git", () => git);

const user = { author: "Test User", authorEmail: "test@example.com" };

describe("built-in plugins", () => {
  let tempRoot: string;

  const read = (...segments: string[]) =>
    fs.readFileSync(path.join(tempRoot, "demo-app", ...segments), "utf8");
  const exists = (...segments: string[]) => fs.existsSync(path.join(tempRoot, "demo-app", ...segments));
  const scaffold = (project: ProjectConfig) =>
    runScaffold(createBaseConfig(tempRoot, "demo-app", user), project, BUILTIN_PLUGINS);

  beforeEach(() => {
    tempRoot = fs.mkdtempSync(path.join(os.tmpdir(), "pyscaff-plugins-test-"));
    git.initRepository.mockReset();
    git.initRepository.mockReturnValue(null);
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempRoot, { recursive: true, force: true });
  });

  test("resolve in a fixed order with vcs last", () => {
    const report = scaffold(createDefaultProjectConfig("demo-app"));
    expect(report.order).toEqual([
      "core",
      "readme",
      "pyproject",
      "pre-commit",
      "editor",
      "docs",
      "cloud-code-base",
      "tests",
      "static-checkers",
      "formatters",
      "spell-checker",
      "vcs",
    ]);
  });

  test("default configuration writes tool tables into pyproject.toml", () => {
    const report = scaffold(createDefaultProjectConfig("demo-app"));

    expect(report.warnings).toEqual([]);
    expect(git.initRepository).toHaveBeenCalledWith(path.join(tempRoot, "demo-app"));

    expect(read("src", "demo_app", "__init__.py")).toBe("");
    expect(read("tests", "__init__.py")).toBe("");
    expect(read("README.md").startsWith("# demo-app\n")).toBe(true);
    expect(read(".flake8")).toBe("[flake8]\nmax-line-length = 95\n");
    expect(read("mkdocs.yml")).toBe("site_name: demo-app\nnav:\n  - Home: index.md\n");
    expect(read("docs", "index.md").startsWith("# Documentation")).toBe(true);
    expect(read(".github", "workflows", "ci.yml")).toContain(
      'python-version: ["3.10", "3.11", "3.12", "3.13"]'
    );
    expect(read(".github", "workflows", "release.yml")).toContain("url: https://pypi.org/project/demo-app/");
    expect(read(".gitignore")).toContain("__pycache__/");
    expect(exists(".pre-commit-config.yaml")).toBe(true);

    for (const standAlone of ["pytest.ini", ".mypy.ini", "pyrightconfig.json", ".pylintrc", "ruff.toml", ".isort.cfg"]) {
      expect(exists(standAlone)).toBe(false);
    }

    const workspace = JSON.parse(read("demo-app.code-workspace"));
    expect(workspace.folders).toEqual([{ path: "." }]);
    expect(workspace.settings["editor.rulers"]).toEqual([95]);

    const cspell = JSON.parse(read("cspell.json"));
    expect(cspell.words).toEqual(["demo-app", "demo_app"]);

    const doc = parse(read("pyproject.toml"));
    expect(doc["build-system"]).toEqual({ requires: ["hatchling"], "build-backend": "hatchling.build" });
    expect(doc.project).toMatchObject({
      name: "demo-app",
      version: "0.0.0",
      readme: "README.md",
      "requires-python": ">=3.10",
      license: "MIT",
      authors: [{ name: "Test User", email: "test@example.com" }],
      dynamic: [],
    });
    expect(doc["dependency-groups"]).toEqual({
      tests: ["pytest", "pytest-cov"],
      static_checkers: ["flake8", "mypy", "pyright", "pylint"],
      formatters: ["ruff", "isort"],
      docs: ["mkdocs"],
    });
    expect(doc.tool).toMatchObject({
      hatch: { build: { targets: { wheel: { packages: ["src/demo_app"] } } } },
      pytest: { ini_options: { addopts: expect.stringContaining("--cov .") } },
      mypy: { python_version: "3.10", exclude: [] },
      pyright: { pythonVersion: "3.10" },
      pylint: { "messages control": { disable: [] } },
      ruff: { "line-length": 95, format: { "quote-style": "double" } },
      isort: { profile: "black", line_length: 95 },
    });
  });

  test("stand-alone preference writes one file per tool", () => {
    const project: ProjectConfig = {
      ...createDefaultProjectConfig("demo-app"),
      layout: "flat",
      buildBackend: "Setuptools",
      dynamicVersion: true,
      configurationPreference: "stand_alone",
      formatters: ["ruff", "isort", "black"],
      spellChecker: "codespell",
      docs: "sphinx",
      codeEditor: null,
      preCommit: false,
      cloudCodeBase: null,
      initGit: false,
    };

    scaffold(project);

    expect(git.initRepository).not.toHaveBeenCalled();
    expect(read("demo_app", "__init__.py")).toBe("");
    expect(exists("src")).toBe(false);
    expect(read(".mypy.ini")).toBe("[mypy]\n");
    expect(JSON.parse(read("pyrightconfig.json"))).toEqual({ pythonVersion: "3.10" });
    expect(read(".pylintrc")).toBe("[MASTER]\n");
    expect(read("ruff.toml")).toContain("line-length = 95");
    expect(read(".isort.cfg")).toBe("[settings]\nprofile=black\nline_length=95\n");
    expect(read("pytest.ini")).toContain("addopts = --cov .");
    expect(read(".codespellrc")).toBe("[codespell]\nskip = .git,*.lock,.venv\n");
    expect(read("docs", "conf.py")).toContain('project = "demo-app"');
    expect(read("docs", "index.rst")).toBe(
      `demo-app documentation\n${"=".repeat(22)}\n\n.. toctree::\n   :maxdepth: 2\n`
    );
    expect(read(".gitignore")).toContain(".venv/");

    for (const skipped of [".github", ".pre-commit-config.yaml", "demo-app.code-workspace", "mkdocs.yml", "cspell.json"]) {
      expect(exists(skipped)).toBe(false);
    }

    const doc = parse(read("pyproject.toml"));
    expect(doc["build-system"]).toEqual({ requires: ["setuptools"], "build-backend": "setuptools.build_meta" });
    expect(doc.project).toMatchObject({ dynamic: ["version"] });
    expect(doc.project).not.toHaveProperty("version");
    // black has no stand-alone config file
    expect(doc.tool).toEqual({ black: { "line-length": 95 } });
  });

  test("a non-empty target directory fails before anything is written", () => {
    const target = path.join(tempRoot, "demo-app");
    fs.mkdirSync(target);
    fs.writeFileSync(path.join(target, "keep.txt"), "existing", "utf8");

    expect(() => scaffold(createDefaultProjectConfig("demo-app"))).toThrow(PreconditionFailedError);
    expect(fs.readdirSync(target)).toEqual(["keep.txt"]);
  });

  test("a file at the project path fails the precondition", () => {
    const target = path.join(tempRoot, "demo-app");
    fs.writeFileSync(target, "not a folder", "utf8");

    expect(() => scaffold(createDefaultProjectConfig("demo-app"))).toThrowError(
      new PreconditionFailedError("core", `${target} already exists and is not a directory.`)
    );
    expect(fs.readFileSync(target, "utf8")).toBe("not a folder");
  });

  test("an empty existing target directory is accepted", () => {
    fs.mkdirSync(path.join(tempRoot, "demo-app"));
    scaffold(createDefaultProjectConfig("demo-app"));
    expect(exists("pyproject.toml")).toBe(true);
  });

  test("a git failure becomes a warning", () => {
    git.initRepository.mockReturnValue(new ExternalToolError("git init"));

    const report = scaffold(createDefaultProjectConfig("demo-app"));

    expect(report.warnings).toEqual(["Failed to initialize git repository: Command failed: git init"]);
    expect(exists(".gitignore")).toBe(true);
  });
});

describe("buildPyProjectDocument", () => {
  const base = createBaseConfig("/work", "demo-app", user);
  const pick = (project: ProjectConfig) => ({
    buildBackend: project.buildBackend,
    pkgLicense: project.pkgLicense,
    minPyVersion: project.minPyVersion,
    dynamicVersion: project.dynamicVersion,
    layout: project.layout,
    staticCodeCheckers: project.staticCodeCheckers,
    formatters: project.formatters,
    docs: project.docs,
  });

  test("hatchling with a dynamic version reads it from git", () => {
    const doc = buildPyProjectDocument(
      base,
      pick({ ...createDefaultProjectConfig("demo-app"), dynamicVersion: true, layout: "flat", pkgLicense: "GPL" })
    );

    expect(doc["build-system"]).toEqual({ requires: ["hatchling", "hatch-vcs"], "build-backend": "hatchling.build" });
    expect(doc.project).toMatchObject({ license: "GPL-3.0-or-later", dynamic: ["version"] });
    expect(doc.project).not.toHaveProperty("version");
    expect(doc.tool).toEqual({
      hatch: {
        build: {
          targets: {
            sdist: { include: ["README.md", "LICENSE", "CHANGELOG.md"], exclude: [] },
            wheel: { packages: ["demo_app"] },
          },
        },
        version: { source: "vcs" },
      },
    });
  });

  test("no backend leaves out the build-system table", () => {
    const doc = buildPyProjectDocument(
      base,
      pick({ ...createDefaultProjectConfig("demo-app"), buildBackend: null, docs: null })
    );
    expect(doc).not.toHaveProperty("build-system");
    expect(doc.tool).toEqual({});
    expect(doc["dependency-groups"]).toMatchObject({ docs: [] });
  });

  test.each([
    ["Poetry-core", "poetry-core", "poetry.core.masonry.api"],
    ["PDM-backend", "pdm-backend", "pdm.backend"],
    ["Flit-core", "flit-core", "flit_core.buildapi"],
  ] as const)("%s maps to its build-system table", (backend, requirement, entry) => {
    const doc = buildPyProjectDocument(
      base,
      pick({ ...createDefaultProjectConfig("demo-app"), buildBackend: backend })
    );
    expect(doc["build-system"]).toEqual({ requires: [requirement], "build-backend": entry });
  });
});
