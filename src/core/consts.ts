import type { BuildBackend, License, PythonVersion } from "../types/config";

export const TOOL_NAME = "pyscaff";

export const README_FNAME = "README.md";
export const PYPROJECT_TOML_FNAME = "pyproject.toml";
export const CONFIG_FNAME = "config.json5";
export const CONFIG_SCHEMA_FNAME = "schema.json";
export const WORKSPACE_FNAME = `${TOOL_NAME}.code-workspace`;

export const DEFAULT_RULER_LEN = 95;

/** CI matrix: the minimum supported version and every newer one. */
export const PYTHON_VERSION_MATRIX: Record<PythonVersion, PythonVersion[]> = {
  "3.10": ["3.10", "3.11", "3.12", "3.13"],
  "3.11": ["3.11", "3.12", "3.13"],
  "3.12": ["3.12", "3.13"],
  "3.13": ["3.13"],
};

export interface BuildSystemTable {
  requires: string[];
  "build-backend": string;
}

export const BUILD_BACKEND_MANIFESTS: Record<BuildBackend, BuildSystemTable> = {
  Hatchling: { requires: ["hatchling"], "build-backend": "hatchling.build" },
  Setuptools: { requires: ["setuptools"], "build-backend": "setuptools.build_meta" },
  "Poetry-core": { requires: ["poetry-core"], "build-backend": "poetry.core.masonry.api" },
  "PDM-backend": { requires: ["pdm-backend"], "build-backend": "pdm.backend" },
  "Flit-core": { requires: ["flit-core"], "build-backend": "flit_core.buildapi" },
};

/** SPDX expressions written to `project.license`. */
export const LICENSE_EXPRESSIONS: Record<License, string> = {
  MIT: "MIT",
  GPL: "GPL-3.0-or-later",
  Apache: "Apache-2.0",
  BSD: "BSD-3-Clause",
  Proprietary: "LicenseRef-Proprietary",
};
