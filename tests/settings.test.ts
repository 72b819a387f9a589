import { afterAll, afterEach, beforeAll, describe, expect, it } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { EngineSettings, parseEngineConfig } from "../src/config/settings.js";
import { ConfigurationError } from "../src/core/errors.js";

describe("EngineSettings", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "module-runner-settings-"));
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  afterEach(() => {
    delete process.env.MODULE_RUNNER_TEST_TEMPLATES;
  });

  it("loads the shipped default settings", async () => {
    const settings = await EngineSettings.loadFromFile(path.resolve("config/default.config.yaml"));
    expect(settings.templateRoot()).toBe("templates");
    expect(settings.runsDir()).toBe("var/runs");
    expect(settings.dryRunMarker()).toBe("-dryrun");
    expect(settings.compoundFileTypes()).toEqual(["FASTQ.GZ"]);
    expect(settings.transferMock()).toBe(false);
    expect(settings.transferTimeoutMs()).toBe(3_600_000);
    expect(settings.executionTimeoutSeconds()).toBe(86_400);
    expect(settings.objectStore()).toEqual({ region: "us-east-1", server_side_encryption: "AES256" });
    expect(settings.settingsHash).toMatch(/^sha256:[a-f0-9]{64}$/);
  });

  it("fills defaults for a minimal file", async () => {
    const file = path.join(tmpDir, "minimal.yaml");
    await writeFile(file, "version: 1\ntemplate_root: /srv/templates\n", "utf8");
    const settings = await EngineSettings.loadFromFile(file);
    expect(settings.runsDir()).toBe("var/runs");
    expect(settings.dryRunMarker()).toBe("-dryrun");
    expect(settings.transferTimeoutMs()).toBe(3_600_000);
    expect(settings.objectStore()).toEqual({});
  });

  it("expands environment references", async () => {
    process.env.MODULE_RUNNER_TEST_TEMPLATES = "s3://module-templates/v2/";
    const config = parseEngineConfig({ version: 1, template_root: "${MODULE_RUNNER_TEST_TEMPLATES}" }, "inline");
    expect(config.template_root).toBe("s3://module-templates/v2/");
  });

  it("rejects an unset environment reference", () => {
    expect(() => parseEngineConfig({ version: 1, template_root: "$MODULE_RUNNER_TEST_TEMPLATES" }, "inline")).toThrow(
      ConfigurationError
    );
  });

  it("rejects an unknown version", () => {
    expect(() => parseEngineConfig({ version: 2, template_root: "templates" }, "inline")).toThrow(/invalid settings/);
  });

  it("wraps a missing file and broken YAML as configuration errors", async () => {
    await expect(EngineSettings.loadFromFile(path.join(tmpDir, "absent.yaml"))).rejects.toBeInstanceOf(ConfigurationError);
    const broken = path.join(tmpDir, "broken.yaml");
    await writeFile(broken, "version: [1\n", "utf8");
    await expect(EngineSettings.loadFromFile(broken)).rejects.toThrow(/not valid YAML/);
  });

  it("overrides roots without touching the rest", () => {
    const settings = new EngineSettings(parseEngineConfig({ version: 1, template_root: "a", runs_dir: "r" }, "inline"));
    const moved = settings.withTemplateRoot("b").withRunsDir("s");
    expect(moved.templateRoot()).toBe("b");
    expect(moved.runsDir()).toBe("s");
    expect(settings.templateRoot()).toBe("a");
    expect(moved.settingsHash).not.toBe(settings.settingsHash);
  });
});
