import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";

describe("loadDefaultConfig", () => {
  it("validates the bundled defaults", () => {
    const config = loadDefaultConfig();
    expect(config.service.baseUrl).toBe(
      "https://bibliotheque-numerique.inha.fr",
    );
    expect(config.output).toEqual({
      directory: null,
      extension: "jpg",
      padding: 6,
      overwrite: false,
    });
  });
});

describe("mergeConfig", () => {
  it("merges nested sections field by field", () => {
    const base = loadDefaultConfig();
    const merged = mergeConfig(base, {
      http: { timeout: 5000 },
      output: { overwrite: true },
    });
    expect(merged.http).toEqual({
      timeout: 5000,
      userAgent: base.http.userAgent,
    });
    expect(merged.output.overwrite).toBe(true);
    expect(merged.output.padding).toBe(6);
    expect(merged.service).toEqual(base.service);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "inha-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies a custom config file", async () => {
    const path = join(dir, "custom.json");
    await writeFile(
      path,
      JSON.stringify({ output: { padding: 3, extension: "png" } }),
    );

    const { config, errors } = await loadConfig(path);

    expect(errors.filter((e) => e.path === path)).toEqual([]);
    expect(config.output.padding).toBe(3);
    expect(config.output.extension).toBe("png");
  });

  it("reports an invalid custom file and keeps the defaults", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, JSON.stringify({ http: { timeout: -1 } }));

    const { config, errors } = await loadConfig(path);

    expect(errors.map((e) => e.path)).toContain(path);
    expect(config.http.timeout).toBe(60000);
  });

  it("rejects an image template with unknown placeholders", async () => {
    const path = join(dir, "template.json");
    await writeFile(
      path,
      JSON.stringify({
        service: { imageUrlTemplate: "https://example.test/{page}.jpg" },
      }),
    );

    const { config, errors } = await loadConfig(path);

    expect(errors.map((e) => e.path)).toContain(path);
    expect(config.service.imageUrlTemplate).toBe(
      loadDefaultConfig().service.imageUrlTemplate,
    );
  });

  it("reports a missing custom file", async () => {
    const path = join(dir, "missing.json");
    const { errors } = await loadConfig(path);
    expect(errors.map((e) => e.path)).toContain(path);
  });
});
