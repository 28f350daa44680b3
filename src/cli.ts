#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "node:url";
import { resolveRunOptions } from "./cli-options.js";
import type { CliFlags } from "./cli-options.js";
import { ConfigError, loadConfig } from "./config.js";
import { isRecord } from "./shared.js";
import { runWebpMirror } from "./runner.js";
import type { RunOptions } from "./runner.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, "../package.json"), "utf-8")
  );
  if (isRecord(pkg) && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

const version = readVersion();
const program = new Command();

program
  .name("webpmirror")
  .description("Convert a directory tree of images to WebP, mirroring its layout")
  .version(version)
  .argument("<input>", "Directory containing images to convert")
  .option("-o, --output <dir>", "Output directory (created when absent)")
  .option("-q, --quality <number>", "WebP quality (1-100, default 89)")
  .option("--lossless", "Use lossless compression")
  .option("--no-lossless", "Use lossy compression")
  .option("--append-name", "Number colliding outputs as \"name (2).webp\" (default)")
  .option("--no-append-name", "Skip sources whose output already exists")
  .option("-c, --concurrency <number>", "Maximum images converted at once (default 8)")
  .option("--engine <engine>", "Conversion engine: magick (ffprobe + ImageMagick) or sharp")
  .option("--ffprobe <path>", "ffprobe executable")
  .option("--magick <path>", "ImageMagick executable")
  .option("--config <path>", "Config file (default: webpmirror.config.json)")
  .option("--json", "Print the run report as JSON")
  .option("--verbose", "Print extra diagnostics")
  .option("--quiet", "Only print failures and the summary")
  .action(async (input: string, opts: CliFlags) => {
    const cwd = process.cwd();
    let runOptions: RunOptions;
    try {
      const configPath = typeof opts.config === "string" ? opts.config : undefined;
      runOptions = resolveRunOptions(input, opts, loadConfig(cwd, configPath), cwd, version);
    } catch (err) {
      if (err instanceof ConfigError) {
        console.error(chalk.red(err.message));
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    const controller = new AbortController();
    const onInterrupt = () => {
      console.error(chalk.yellow("\nInterrupted, stopping running conversions..."));
      controller.abort();
    };
    process.once("SIGINT", onInterrupt);

    try {
      const result = await runWebpMirror({ ...runOptions, signal: controller.signal });
      if (runOptions.json) {
        console.log(JSON.stringify(result.document, null, 2));
      }
      process.exitCode = result.exitCode;
    } finally {
      process.off("SIGINT", onInterrupt);
    }
  });

program.parseAsync().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(`Error: ${message}`));
  process.exitCode = 1;
});
