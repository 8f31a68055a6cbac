import type { PythonVersion } from "../types/config";
import { DEFAULT_RULER_LEN, PYTHON_VERSION_MATRIX } from "./consts";

export function buildReadme(projectName: string): string {
  return `# ${projectName}

This is a Python project scaffolded with pyscaff. Here is what you need to do next:
1. Install the dependencies: \`uv sync\`
2. Install the pre-commit hooks: \`pre-commit install\`
3. Create a repository on GitHub
4. Run \`git remote add origin https://github.com/<user-name>/<repo-name>.git\`
5. Push to remote: \`git push -u origin main\`
6. Register your project on PyPI
7. Release a new version on GitHub.
8. The release pipeline will publish the package to PyPI.
`;
}

export function buildGhActionCi(minPyVersion: PythonVersion): string {
  const versions = PYTHON_VERSION_MATRIX[minPyVersion].map((v) => `"${v}"`).join(", ");
  return `name: CI

on:
  push:
    branches: [main]
  pull_request:
    branches: [main]

permissions:
  contents: write

jobs:
  develop:
    strategy:
      fail-fast: false
      matrix:
        python-version: [${versions}]
        os: [ubuntu-latest, macos-latest, windows-latest]
    defaults:
      run:
        shell: bash

    runs-on: \${{ matrix.os }}
    steps:
      - name: Check out repository
        uses: actions/checkout@v4
        with:
          fetch-depth: 0

      - name: Set up Python \${{ matrix.python-version }}
        uses: actions/setup-python@v5
        with:
          python-version: \${{ matrix.python-version }}

      - name: Build package
        run: |
          python -m pip install --upgrade pip
          python -m pip install build
          python -m build

      - name: Upload artifact
        uses: actions/upload-artifact@v4
        with:
          name: build-artifacts-\${{ runner.os }}-py\${{ matrix.python-version }}
          path: dist/*
`;
}

export function buildGhActionRelease(projectName: string): string {
  return `name: release

on:
  release:
    types: [published]

permissions:
  contents: write
  id-token: write

jobs:
  release-build:
    runs-on: ubuntu-latest

    steps:
      - uses: actions/checkout@v4
        with:
          fetch-depth: 0

      - uses: actions/setup-python@v5
        with:
          python-version: 3.x

      - name: Build release distributions
        run: |
          python -m pip install build
          python -m build

      - name: Upload distributions
        uses: actions/upload-artifact@v4
        with:
          name: release-dists
          path: dist/

  pypi-publish:
    runs-on: ubuntu-latest
    needs:
      - release-build
    environment:
      name: pypi
      url: https://pypi.org/project/${projectName}/

    steps:
      - name: Retrieve release distributions
        uses: actions/download-artifact@v4
        with:
          name: release-dists
          path: dist/

      - name: Publish release distributions to PyPI
        uses: pypa/gh-action-pypi-publish@release/v1
        with:
          packages-dir: dist/
`;
}

export function buildMkDocsConfig(projectName: string): string {
  return `site_name: ${projectName}
nav:
  - Home: index.md
`;
}

export const MKDOCS_INDEX_CONTENT = `# Documentation

This is the documentation for your project.
`;

export function buildSphinxConf(projectName: string, author: string): string {
  return `project = ${JSON.stringify(projectName)}
author = ${JSON.stringify(author)}

extensions = ["sphinx.ext.autodoc", "sphinx.ext.napoleon"]
exclude_patterns = ["_build"]
html_theme = "alabaster"
`;
}

export function buildSphinxIndex(projectName: string): string {
  const title = `${projectName} documentation`;
  return `${title}
${"=".repeat(title.length)}

.. toctree::
   :maxdepth: 2
`;
}

export const RUFF_CONFIG_CONTENT = `exclude = []
line-length = ${DEFAULT_RULER_LEN}
indent-width = 4

[lint]
ignore = []

[format]
quote-style = "double"
indent-style = "space"
`;

export const FLAKE8_CONFIG_CONTENT = `[flake8]
max-line-length = ${DEFAULT_RULER_LEN}
`;

export const MYPY_CONFIG_CONTENT = "[mypy]\n";

export const PYLINT_CONFIG_CONTENT = "[MASTER]\n";

export const ISORT_CONFIG_CONTENT = `[settings]
profile=black
line_length=${DEFAULT_RULER_LEN}
`;

export const CODESPELL_CONFIG_CONTENT = `[codespell]
skip = .git,*.lock,.venv
`;

export function buildCspellConfig(words: string[]) {
  return {
    version: "0.2",
    language: "en",
    words,
    ignorePaths: [".venv", "dist", "site"],
  };
}

export const PRE_COMMIT_CONTENT = `repos:
  - repo: https://github.com/pre-commit/pre-commit-hooks
    rev: v5.0.0
    hooks:
      - id: end-of-file-fixer
      - id: trailing-whitespace
      - id: check-yaml
      - id: check-toml
      - id: check-added-large-files
`;

export const PYTEST_ADDOPTS =
  "--cov . --cov-report xml:tests/.coverage/cov.xml --cov-report html:tests/.coverage/html";

export const PYTEST_CONFIG_CONTENT = `[pytest]
; https://pytest-cov.readthedocs.io/en/latest/config.html
addopts = ${PYTEST_ADDOPTS}
`;

export function buildCodeWorkspace() {
  const interpreter = "${workspaceFolder}/.venv/Scripts/python.exe";
  return {
    folders: [{ path: "." }],
    settings: {
      "python.defaultInterpreterPath": interpreter,
      "pylint.interpreter": [interpreter],
      "editor.rulers": [DEFAULT_RULER_LEN],
      "mypy-type-checker.importStrategy": "fromEnvironment",
      "mypy-type-checker.interpreter": [interpreter],
    },
  };
}

export const GITIGNORE_CONTENT = `# Byte-compiled / optimized / DLL files
__pycache__/
*.py[cod]
*$py.class

# pytest
.cache/
.pytest_cache/

# Coverage reports
htmlcov/
.tox/
.coverage
.coverage.*
coverage.xml
*.cover
.hypothesis/
tests/.coverage/

# Build output
*.whl
dist/
build/
site/

# Environments
.venv/
.benchmarks/

_version.py
`;
