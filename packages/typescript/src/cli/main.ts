import { realpathSync } from "node:fs";
import { join, resolve } from "node:path";
import { pathToFileURL } from "node:url";

import { config as loadEnv } from "dotenv";

import { DEFAULT_CONFIG_FILE, loadConfig } from "../config.ts";
import type { ResolvedConfig } from "../config.ts";
import { DocumentWorkspace } from "../documents/workspace.ts";
import { ConfigurationError } from "../errors.ts";
import { OpenCodeClient } from "../llm/client.ts";
import type { Generator } from "../llm/client.ts";
import { createFileLogger, runId } from "../logger.ts";
import type { Logger } from "../logger.ts";
import type { PipelineOptions, PipelineSettings } from "../pipeline/base.ts";
import { RequirementCheckPipeline } from "../pipeline/check.ts";
import { DesignPipeline } from "../pipeline/design.ts";
import { ModuleSplitPipeline } from "../pipeline/split.ts";

export const VERSION = "0.1.0";

export type CliDependencies = {
  generator?: Generator;
  logger?: Logger;
};

const COMMANDS = ["check", "split", "design", "all"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

function parseArg(argv: string[], name: string): string | null {
  const idx = argv.indexOf(name);
  if (idx === -1 || idx + 1 >= argv.length) {
    return null;
  }
  return argv[idx + 1] ?? null;
}

export function parsePositiveInt(argv: string[], name: string): number | undefined {
  const raw = parseArg(argv, name);
  if (raw == null) {
    return undefined;
  }
  const value = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || !Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${raw}`);
  }
  return value;
}

export function toSnakeCaseObject(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => toSnakeCaseObject(item));
  }
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      const snake = key.replace(/[A-Z]/g, (char) => `_${char.toLowerCase()}`);
      out[snake] = toSnakeCaseObject(entry);
    }
    return out;
  }
  return value;
}

function cliSettings(argv: string[], fromFile: PipelineSettings): PipelineSettings {
  return {
    candidates: parsePositiveInt(argv, "--candidates") ?? fromFile.candidates,
    alignRounds: parsePositiveInt(argv, "--align-rounds") ?? fromFile.alignRounds,
    refinementFactor: parsePositiveInt(argv, "--refinement-factor") ?? fromFile.refinementFactor,
  };
}

function usageText(): string {
  return [
    "Usage: design-council <command> [options]",
    "       npm start -- <command> [options]",
    "",
    "Commands:",
    "  check    Audit the requirement documents for gaps",
    "  split    Produce requirement_leader.md, the module split",
    "  design   Produce design_overall.md and one design document per module",
    "  all      Run check, split and design in order",
    "",
    "Options:",
    "  --workdir <dir>              Document directory (default: current directory)",
    `  --config <file>              Agent config (default: <workdir>/${DEFAULT_CONFIG_FILE})`,
    "  --base-url <url>             Model server URL (default: OPENCODE_BASE_URL or http://localhost:3000)",
    "  --log-file <file>            Run log (default: <workdir>/logs/design_<timestamp>.log)",
    "  --candidates <n>             Candidate documents per round",
    "  --align-rounds <n>           Interface alignment rounds",
    "  --refinement-factor <n>      Review and optimize rounds a refinement loop may afford",
    "",
    "Examples:",
    "  design-council split --workdir ./project --candidates 3",
    "  design-council all --config agents_config.yaml --log-file run.log",
  ].join("\n");
}

async function runCommand(command: Command, options: PipelineOptions): Promise<Record<string, unknown>> {
  switch (command) {
    case "check":
      return { check: await new RequirementCheckPipeline(options).run() };
    case "split":
      return { split: await new ModuleSplitPipeline(options).run() };
    case "design":
      return { design: await new DesignPipeline(options).run() };
    case "all":
      return {
        check: await new RequirementCheckPipeline(options).run(),
        split: await new ModuleSplitPipeline(options).run(),
        design: await new DesignPipeline(options).run(),
      };
  }
}

export async function main(argv: string[] = process.argv.slice(2), deps: CliDependencies = {}): Promise<number> {
  if (argv.length === 0 || argv.includes("--help") || argv.includes("-h")) {
    process.stdout.write(`${usageText()}\n`);
    return 0;
  }

  if (argv.includes("--version") || argv.includes("-v")) {
    process.stdout.write(`${VERSION}\n`);
    return 0;
  }

  const command = argv[0];
  if (!isCommand(command)) {
    throw new ConfigurationError(`Supported commands: ${COMMANDS.join(", ")}`);
  }

  loadEnv();

  const workdir = resolve(parseArg(argv, "--workdir") ?? process.cwd());
  const id = runId();
  const logFile = parseArg(argv, "--log-file") ?? join(workdir, "logs", `design_${id}.log`);
  const logger = deps.logger?.child({ runId: id }) ?? createFileLogger(logFile, id);

  const resolved: ResolvedConfig = loadConfig(parseArg(argv, "--config") ?? join(workdir, DEFAULT_CONFIG_FILE), logger);
  const settings = cliSettings(argv, resolved.settings);
  const generator =
    deps.generator ??
    new OpenCodeClient({
      baseUrl: parseArg(argv, "--base-url") ?? resolved.baseUrl,
      timeoutMs: resolved.timeoutMs,
      logger,
    });

  logger.info({ command, workdir, settings, writers: resolved.writers, reviewers: resolved.reviewers }, "run started");

  const report = await runCommand(command, {
    workspace: new DocumentWorkspace(workdir),
    generator,
    writers: resolved.writers,
    reviewers: resolved.reviewers,
    settings,
    logger,
  });

  process.stdout.write(`${JSON.stringify(toSnakeCaseObject(report))}\n`);
  return 0;
}

/** True when `scriptPath`, after resolving symlinks, is the module at `moduleUrl`. */
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath) {
    return false;
  }
  let realPath: string;
  try {
    realPath = realpathSync(scriptPath);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return false;
    }
    throw err;
  }
  return pathToFileURL(realPath).href === moduleUrl;
}

if (isEntryPoint(import.meta.url, process.argv[1])) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err) => {
      console.error(err);
      process.exitCode = 1;
    },
  );
}
