#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command, InvalidArgumentError } from "commander";
import pkg from "../../package.json";
import { runCapture } from "../commands/capture";
import { runAssemble } from "../commands/assemble";
import { runValidate } from "../commands/validate";
import { CaptureConfigInput } from "../config/captureConfig";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.VIEWER_CAPTURE_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return parsed;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("viewer-page-capture")
  .description("Capture every page of a newspaper viewer into one PDF")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides VIEWER_CAPTURE_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

interface CaptureCommandOpts {
  viewer: string;
  out: string;
  pagesDir?: string;
  usernameEnv: string;
  passwordEnv: string;
  headless: boolean;
  minWidth?: number;
  timeoutMs?: number;
  settleMs?: number;
  attempts?: number;
}

program
  .command("capture")
  .requiredOption("--viewer <path>", "Path to viewer config JSON")
  .option("--out <dir>", "Output directory for the PDF and manifest", "./output")
  .option("--pages-dir <dir>", "Directory for page images (default <out>/pages)")
  .option("--username-env <env>", "Env var with the viewer username", "VIEWER_USERNAME")
  .option("--password-env <env>", "Env var with the viewer password", "VIEWER_PASSWORD")
  .option("--headless", "Run the browser without a window", false)
  .option("--min-width <px>", "Minimum width of a real page image", parseInteger)
  .option("--timeout-ms <ms>", "How long to wait for hi-res pages per step", parseInteger)
  .option("--settle-ms <ms>", "Wait after each navigation attempt", parseInteger)
  .option("--attempts <n>", "Navigation attempts before assuming the end", parseInteger)
  .action(async (opts: CaptureCommandOpts) => {
    const tuning: CaptureConfigInput = {
      minPageWidth: opts.minWidth,
      stabilizationTimeoutMs: opts.timeoutMs,
      navSettleMs: opts.settleMs,
      navMaxAttempts: opts.attempts
    };
    await runCapture({
      viewerPath: opts.viewer,
      outDir: opts.out,
      pagesDir: opts.pagesDir,
      usernameEnv: opts.usernameEnv,
      passwordEnv: opts.passwordEnv,
      headless: opts.headless,
      tuning
    });
  });

program
  .command("assemble")
  .requiredOption("--pages <dir>", "Directory of page_NNN images")
  .option("--out <path>", "Output PDF path (default YYYYMMDD.pdf beside the pages directory)")
  .action(async (opts: { pages: string; out?: string }) => {
    await runAssemble({ pagesDir: opts.pages, outPath: opts.out });
  });

program
  .command("validate")
  .requiredOption("--run <path>", "Output directory of a capture run")
  .action(async (opts: { run: string }) => {
    const report = await runValidate({ runDir: opts.run });
    console.log(`Capture manifest OK: ${report.pages} pages, PDF pages: ${report.pdfPages ?? "none"}`);
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
