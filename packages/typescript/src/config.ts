import { existsSync, readFileSync } from "node:fs";

import { parse } from "yaml";
import { z } from "zod";

import { ConfigurationError } from "./errors.ts";
import type { Identity } from "./llm/client.ts";
import rootLogger from "./logger.ts";
import type { Logger } from "./logger.ts";
import { DEFAULT_SETTINGS } from "./pipeline/base.ts";
import type { PipelineSettings } from "./pipeline/base.ts";

export const DEFAULT_CONFIG_FILE = "agents_config.yaml";

const ModelListSchema = z
  .object({
    models: z.array(z.string().min(1)).optional(),
  })
  .passthrough();

const positiveInt = z.number().int().positive();

const ConfigFileSchema = z
  .object({
    agents: z
      .object({
        doc_writer: ModelListSchema.optional(),
        doc_reviewer: ModelListSchema.optional(),
      })
      .passthrough()
      .optional(),
    pipeline: z
      .object({
        candidates: positiveInt.optional(),
        align_rounds: positiveInt.optional(),
        refinement_factor: positiveInt.optional(),
      })
      .passthrough()
      .optional(),
    server: z
      .object({
        base_url: z.string().url().optional(),
        timeout_ms: positiveInt.optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type ResolvedConfig = {
  writers: Identity[];
  reviewers: Identity[];
  settings: PipelineSettings;
  baseUrl?: string;
  timeoutMs?: number;
};

function identitiesFor(role: string, models: string[] | undefined, log: Logger): Identity[] {
  if (models && models.length > 0) {
    return [...models];
  }
  log.warn({ role }, "no models configured, using the server default model");
  return [null];
}

/**
 * Validates a parsed config document. `null`/`undefined` (an empty file)
 * yields the defaults.
 */
export function resolveConfig(raw: unknown, logger: Logger = rootLogger): ResolvedConfig {
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`Invalid configuration: ${detail}`);
  }
  const file = result.data;

  return {
    writers: identitiesFor("doc_writer", file.agents?.doc_writer?.models, logger),
    reviewers: identitiesFor("doc_reviewer", file.agents?.doc_reviewer?.models, logger),
    settings: {
      candidates: file.pipeline?.candidates ?? DEFAULT_SETTINGS.candidates,
      alignRounds: file.pipeline?.align_rounds ?? DEFAULT_SETTINGS.alignRounds,
      refinementFactor: file.pipeline?.refinement_factor ?? DEFAULT_SETTINGS.refinementFactor,
    },
    baseUrl: file.server?.base_url,
    timeoutMs: file.server?.timeout_ms,
  };
}

export function loadConfig(path: string, logger: Logger = rootLogger): ResolvedConfig {
  if (!existsSync(path)) {
    logger.warn({ path }, "config file not found, using defaults");
    return resolveConfig({}, logger);
  }

  let raw: unknown;
  try {
    raw = parse(readFileSync(path, "utf8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Could not parse ${path}: ${message}`);
  }
  logger.debug({ path }, "config loaded");
  return resolveConfig(raw, logger);
}
