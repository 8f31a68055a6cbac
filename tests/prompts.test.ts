import { beforeEach, describe, expect, test, vi } from "vitest";
import { PromptCancelledError } from "../src/core/errors";
import { promptProjectConfig, promptUserConfig } from "../src/cli/utils/prompts";
import { createDefaultProjectConfig } from "../src/types/config";

const clack = vi.hoisted(() => ({
  text: vi.fn(),
  confirm: vi.fn(),
  select: vi.fn(),
  multiselect: vi.fn(),
  cancel: vi.fn(),
  isCancel: vi.fn((value: unknown) => typeof value === "symbol"),
  log: { success: vi.fn(), info: vi.fn() },
}));

vi.mock("@clack/prompts", () => clack);

describe("promptProjectConfig", () => {
  beforeEach(() => {
    clack.text.mockReset();
    clack.confirm.mockReset();
    clack.select.mockReset();
    clack.multiselect.mockReset();
    clack.cancel.mockReset();
  });

  test("accepting the defaults asks nothing else", async () => {
    clack.confirm.mockResolvedValueOnce(true);

    const config = await promptProjectConfig("demo-app");

    expect(config).toEqual(createDefaultProjectConfig("demo-app"));
    expect(clack.text).not.toHaveBeenCalled();
    expect(clack.select).not.toHaveBeenCalled();
  });

  test("asks for the project name when none was given", async () => {
    clack.text.mockResolvedValueOnce("  demo-app  ");
    clack.confirm.mockResolvedValueOnce(true);

    const config = await promptProjectConfig();

    expect(config.projectName).toBe("demo-app");
    expect(clack.text.mock.calls[0][0].placeholder).toBe("my-project");
  });

  test("collects every answer into the project config", async () => {
    clack.confirm
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(true)
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(false);
    clack.select
      .mockResolvedValueOnce("Apache")
      .mockResolvedValueOnce("3.12")
      .mockResolvedValueOnce("flat")
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce("stand_alone")
      .mockResolvedValueOnce("codespell")
      .mockResolvedValueOnce("sphinx")
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce(null);
    clack.multiselect.mockResolvedValueOnce(["mypy"]).mockResolvedValueOnce(["black"]);

    const config = await promptProjectConfig("demo-app");

    expect(config).toEqual({
      projectName: "demo-app",
      pkgLicense: "Apache",
      minPyVersion: "3.12",
      layout: "flat",
      buildBackend: null,
      dynamicVersion: true,
      configurationPreference: "stand_alone",
      staticCodeCheckers: ["mypy"],
      formatters: ["black"],
      spellChecker: "codespell",
      docs: "sphinx",
      codeEditor: null,
      preCommit: false,
      cloudCodeBase: null,
      initGit: false,
    });
    expect(clack.confirm).toHaveBeenCalledTimes(4);
    expect(clack.select).toHaveBeenCalledTimes(9);
  });

  test("cancelling a prompt aborts", async () => {
    clack.confirm.mockResolvedValueOnce(Symbol("clack:cancel"));

    await expect(promptProjectConfig("demo-app")).rejects.toBeInstanceOf(PromptCancelledError);
    expect(clack.cancel).toHaveBeenCalledWith("Aborted.");
  });
});

describe("promptUserConfig", () => {
  beforeEach(() => {
    clack.text.mockReset();
  });

  test("reuses the git identity when there is one", async () => {
    const gitUser = { author: "Test User", authorEmail: "test@example.com" };
    await expect(promptUserConfig(gitUser)).resolves.toBe(gitUser);
    expect(clack.text).not.toHaveBeenCalled();
  });

  test("asks for name and email otherwise", async () => {
    clack.text.mockResolvedValueOnce(" Test User ").mockResolvedValueOnce("test@example.com");

    await expect(promptUserConfig(null)).resolves.toEqual({
      author: "Test User",
      authorEmail: "test@example.com",
    });

    const validate = clack.text.mock.calls[0][0].validate;
    expect(validate("   ")).toBe("Author name cannot be empty.");
    expect(validate("Test User")).toBeUndefined();
  });
});
