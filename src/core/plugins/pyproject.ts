import { z } from "zod";
import { BUILD_BACKEND_MANIFESTS, LICENSE_EXPRESSIONS, README_FNAME } from "@core/consts";
import { writePyProject, type TomlTable } from "@core/pyproject";
import {
  BUILD_BACKENDS,
  DOCS_GENERATORS,
  FORMATTERS,
  LICENSES,
  PYTHON_VERSIONS,
  STATIC_CODE_CHECKERS,
  type BaseConfig,
} from "../../types/config";
import { definePlugin, succeeded } from "../../types/plugin";
import { CorePlugin, moduleName } from "./core";

const PyProjectConfigSchema = z.object({
  buildBackend: z.enum(BUILD_BACKENDS).nullable(),
  pkgLicense: z.enum(LICENSES),
  minPyVersion: z.enum(PYTHON_VERSIONS),
  dynamicVersion: z.boolean(),
  layout: z.enum(["src", "flat"]),
  staticCodeCheckers: z.array(z.enum(STATIC_CODE_CHECKERS)),
  formatters: z.array(z.enum(FORMATTERS)),
  docs: z.enum(DOCS_GENERATORS).nullable(),
});

type PyProjectConfig = z.infer<typeof PyProjectConfigSchema>;

export function buildPyProjectDocument(base: BaseConfig, config: PyProjectConfig): TomlTable {
  const doc: TomlTable = {};
  const hatchling = config.buildBackend === "Hatchling";

  if (config.buildBackend) {
    const manifest = BUILD_BACKEND_MANIFESTS[config.buildBackend];
    const requires = [...manifest.requires];
    if (hatchling && config.dynamicVersion) requires.push("hatch-vcs");
    doc["build-system"] = { requires, "build-backend": manifest["build-backend"] };
  }

  const person = { name: base.userConfig.author, email: base.userConfig.authorEmail };
  const project: TomlTable = { name: base.projectName };
  if (!config.dynamicVersion) project.version = "0.0.0";
  Object.assign(project, {
    description: "",
    readme: README_FNAME,
    "requires-python": `>=${config.minPyVersion}`,
    license: LICENSE_EXPRESSIONS[config.pkgLicense],
    authors: [person],
    maintainers: [{ ...person }],
    keywords: [],
    classifiers: [],
    dependencies: [],
    dynamic: config.dynamicVersion ? ["version"] : [],
  });
  doc.project = project;

  doc["dependency-groups"] = {
    tests: ["pytest", "pytest-cov"],
    static_checkers: [...config.staticCodeCheckers],
    formatters: [...config.formatters],
    docs: config.docs ? [config.docs] : [],
  };

  const tool: TomlTable = {};
  if (hatchling) {
    const pkg = moduleName(base.projectName);
    const hatch: TomlTable = {
      build: {
        targets: {
          sdist: { include: [README_FNAME, "LICENSE", "CHANGELOG.md"], exclude: [] },
          wheel: { packages: [config.layout === "src" ? `src/${pkg}` : pkg] },
        },
      },
    };
    if (config.dynamicVersion) hatch.version = { source: "vcs" };
    tool.hatch = hatch;
  }
  doc.tool = tool;

  return doc;
}

export const PyProjectTomlPlugin = definePlugin({
  name: "pyproject",
  description: "pyproject.toml manifest",
  dependencies: [CorePlugin],
  schema: PyProjectConfigSchema,
  configure: (project) => ({
    buildBackend: project.buildBackend,
    pkgLicense: project.pkgLicense,
    minPyVersion: project.minPyVersion,
    dynamicVersion: project.dynamicVersion,
    layout: project.layout,
    staticCodeCheckers: project.staticCodeCheckers,
    formatters: project.formatters,
    docs: project.docs,
  }),
  build(base, config) {
    writePyProject(base.projectRoot, buildPyProjectDocument(base, config));
    return succeeded();
  },
});
