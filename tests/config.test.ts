import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { resolveRunOptions } from "../src/cli-options.js";
import { CONFIG_FILE, ConfigError, loadConfig } from "../src/config.js";
import type { LoadedConfig } from "../src/config.js";
import { makeTempDir } from "./stubs.js";

const NO_CONFIG: LoadedConfig = { config: {}, sourcePath: null };

describe("config support", () => {
  let cwd: string;

  beforeEach(() => {
    cwd = makeTempDir("config");
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  function writeJson(name: string, value: unknown) {
    fs.writeFileSync(path.join(cwd, name), JSON.stringify(value, null, 2));
  }

  it("returns an empty config when nothing is present", () => {
    expect(loadConfig(cwd)).toEqual(NO_CONFIG);
  });

  it("loads webpmirror.config.json", () => {
    writeJson(CONFIG_FILE, { output: "converted", quality: 70, lossless: true, engine: "sharp" });

    const loaded = loadConfig(cwd);
    expect(loaded.sourcePath).toBe(path.join(cwd, CONFIG_FILE));
    expect(loaded.config).toMatchObject({
      output: "converted",
      quality: 70,
      lossless: true,
      engine: "sharp",
    });
  });

  it("falls back to the package.json key", () => {
    writeJson("package.json", { name: "site", webpmirror: { concurrency: 2 } });

    const loaded = loadConfig(cwd);
    expect(loaded.sourcePath).toBe(`${path.join(cwd, "package.json")}#webpmirror`);
    expect(loaded.config.concurrency).toBe(2);
  });

  it("prefers webpmirror.config.json over the package.json key", () => {
    writeJson(CONFIG_FILE, { quality: 70 });
    writeJson("package.json", { name: "site", webpmirror: { quality: 40 } });

    const loaded = loadConfig(cwd);
    expect(loaded.sourcePath).toBe(path.join(cwd, CONFIG_FILE));
    expect(loaded.config.quality).toBe(70);
  });

  it("reports invalid values under the package.json key with that origin", () => {
    writeJson("package.json", { name: "site", webpmirror: { quality: 0 } });
    expect(() => loadConfig(cwd)).toThrow(
      `Invalid "quality" in ${path.join(cwd, "package.json")}#webpmirror: expected 1-100.`
    );
  });

  it("ignores a package.json without the key", () => {
    writeJson("package.json", { name: "site" });
    expect(loadConfig(cwd)).toEqual(NO_CONFIG);
  });

  it("prefers an explicit --config path", () => {
    writeJson(CONFIG_FILE, { quality: 70 });
    writeJson("other.json", { quality: 40 });

    expect(loadConfig(cwd, "other.json").config.quality).toBe(40);
    expect(() => loadConfig(cwd, "missing.json")).toThrow(
      `Config file not found: ${path.join(cwd, "missing.json")}`
    );
  });

  it("rejects unknown keys and invalid values", () => {
    const file = path.join(cwd, CONFIG_FILE);

    writeJson(CONFIG_FILE, { formats: ["webp"] });
    expect(() => loadConfig(cwd)).toThrow(`Unknown config key "formats" in ${file}.`);

    writeJson(CONFIG_FILE, { quality: 101 });
    expect(() => loadConfig(cwd)).toThrow(`Invalid "quality" in ${file}: expected 1-100.`);

    writeJson(CONFIG_FILE, { concurrency: 0 });
    expect(() => loadConfig(cwd)).toThrow(`Invalid "concurrency" in ${file}: expected at least 1.`);

    writeJson(CONFIG_FILE, { engine: "vips" });
    expect(() => loadConfig(cwd)).toThrow(
      `Invalid "engine" in ${file}: expected one of magick, sharp.`
    );

    writeJson(CONFIG_FILE, { lossless: "yes" });
    expect(() => loadConfig(cwd)).toThrow(`Invalid "lossless" in ${file}: expected boolean.`);
  });

  it("reports malformed JSON as a ConfigError", () => {
    fs.writeFileSync(path.join(cwd, CONFIG_FILE), "{ quality: ");
    expect(() => loadConfig(cwd)).toThrow(ConfigError);
  });
});

describe("resolveRunOptions", () => {
  const cwd = path.resolve("/work");

  it("applies defaults", () => {
    const options = resolveRunOptions("photos", { output: "out" }, NO_CONFIG, cwd, "1.0.0");

    expect(options).toEqual({
      version: "1.0.0",
      inputDir: path.resolve("/work/photos"),
      outputDir: path.resolve("/work/out"),
      quality: 89,
      lossless: false,
      appendName: true,
      concurrency: 8,
      engine: "magick",
      ffprobePath: "ffprobe",
      magickPath: "magick",
      json: false,
      verbose: false,
      quiet: false,
    });
  });

  it("lets flags override config", () => {
    const loaded: LoadedConfig = {
      config: { output: "from-config", quality: 60, appendName: true, engine: "sharp" },
      sourcePath: "/work/webpmirror.config.json",
    };

    const options = resolveRunOptions(
      "photos",
      { quality: "95", appendName: false, magick: "/opt/magick" },
      loaded,
      cwd,
      "1.0.0"
    );

    expect(options.outputDir).toBe(path.resolve("/work/from-config"));
    expect(options.quality).toBe(95);
    expect(options.appendName).toBe(false);
    expect(options.engine).toBe("sharp");
    expect(options.magickPath).toBe("/opt/magick");
  });

  it("requires an output directory", () => {
    expect(() => resolveRunOptions("photos", {}, NO_CONFIG, cwd, "1.0.0")).toThrow(
      'Missing output directory. Pass --output <dir> or set "output" in config.'
    );
  });

  it("validates numeric flags", () => {
    expect(() =>
      resolveRunOptions("photos", { output: "out", quality: "0" }, NO_CONFIG, cwd, "1.0.0")
    ).toThrow('Invalid quality: "0". Must be an integer between 1 and 100.');
    expect(() =>
      resolveRunOptions("photos", { output: "out", concurrency: "two" }, NO_CONFIG, cwd, "1.0.0")
    ).toThrow('Invalid concurrency: "two". Must be a positive integer.');
  });

  it("lets a verbosity flag override the opposite config setting", () => {
    const loaded: LoadedConfig = { config: { quiet: true }, sourcePath: "/work/cfg.json" };
    const options = resolveRunOptions("photos", { output: "out", verbose: true }, loaded, cwd, "1.0.0");

    expect(options.verbose).toBe(true);
    expect(options.quiet).toBe(false);
  });

  it("rejects verbose and quiet together", () => {
    expect(() =>
      resolveRunOptions(
        "photos",
        { output: "out", verbose: true, quiet: true },
        NO_CONFIG,
        cwd,
        "1.0.0"
      )
    ).toThrow("Invalid verbosity settings in command line: verbose and quiet cannot both be enabled.");

    const loaded: LoadedConfig = {
      config: { verbose: true, quiet: true },
      sourcePath: "/work/cfg.json",
    };
    expect(() => resolveRunOptions("photos", { output: "out" }, loaded, cwd, "1.0.0")).toThrow(
      "Invalid verbosity settings in /work/cfg.json: verbose and quiet cannot both be enabled."
    );
  });
});
