/**
 * Configuration
 *
 * Read from `.replkit.json` in a directory (optional), validated with zod,
 * then overlaid with REPLKIT_INTERPRETER and REPLKIT_DEDICATED from the
 * environment.
 */

import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { DEFAULT_CELL_PATTERNS, type CellPatterns } from "@replkit/source";
import { Effect } from "effect";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { PYTHON_PROMPT_PATTERN, makePromptBoundary, type PromptBoundary } from "./prompt.js";

export const CONFIG_FILE_NAME = ".replkit.json";

// ============================================================
// Schemas
// ============================================================

const isValidPattern = (source: string): boolean => {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
};

const PatternSchema = z.string().refine(isValidPattern, "Invalid regular expression");

export const EchoPolicySchema = z.enum(["always", "never", "when-not-visible"]);

export const WorkingDirectorySchema = z.object({
  mode: z.string(),
  path: z.string().optional(),
});

export const ReplkitConfigSchema = z
  .object({
    interpreter: z.string().min(1).default("python3"),
    interpreterArgs: z.array(z.string()).default(["-i", "-u"]),
    dedicated: z.boolean().default(false),
    echoInput: z.boolean().default(true),
    echoOutput: EchoPolicySchema.default("when-not-visible"),
    echoInputHeadLines: z.number().int().nonnegative().default(10),
    echoInputTailLines: z.number().int().nonnegative().default(10),
    readyTimeoutMs: z.number().int().positive().default(3000),
    readyPollIntervalMs: z.number().int().positive().default(100),
    workingDirectory: WorkingDirectorySchema.default({ mode: "current" }),
    cellBoundaryPattern: PatternSchema.default(DEFAULT_CELL_PATTERNS.boundary.source),
    cellBeginningPattern: PatternSchema.default(DEFAULT_CELL_PATTERNS.beginning.source),
    promptPattern: PatternSchema.default(PYTHON_PROMPT_PATTERN.source),
    runMainGuard: z.boolean().default(false),
  })
  .strict();

export type ReplkitConfig = z.infer<typeof ReplkitConfigSchema>;
export type WorkingDirectorySetting = z.infer<typeof WorkingDirectorySchema>;

export const defaultConfig: ReplkitConfig = ReplkitConfigSchema.parse({});

// ============================================================
// Loading
// ============================================================

const readConfigFile = (file: string) =>
  Effect.tryPromise({
    try: () => readFile(file, "utf-8"),
    catch: (error) => error,
  }).pipe(
    Effect.catchAll((error) =>
      error instanceof Error && "code" in error && error.code === "ENOENT"
        ? Effect.succeed(null)
        : Effect.fail(
            new ConfigurationError({ message: `Cannot read ${file}: ${String(error)}` }),
          ),
    ),
  );

const parseJsonObject = (file: string, text: string) =>
  Effect.try({
    try: (): unknown => JSON.parse(text),
    catch: (error) =>
      new ConfigurationError({ message: `Invalid JSON in ${file}: ${String(error)}` }),
  }).pipe(
    Effect.flatMap((value) =>
      typeof value === "object" && value !== null && !Array.isArray(value)
        ? Effect.succeed(value)
        : Effect.fail(
            new ConfigurationError({ message: `${file} must contain a JSON object` }),
          ),
    ),
  );

const environmentOverrides = (
  env: NodeJS.ProcessEnv,
): Effect.Effect<Record<string, unknown>, ConfigurationError> => {
  const overrides: Record<string, unknown> = {};

  if (env.REPLKIT_INTERPRETER) {
    overrides.interpreter = env.REPLKIT_INTERPRETER;
  }

  const dedicated = env.REPLKIT_DEDICATED?.toLowerCase();
  if (dedicated !== undefined && dedicated !== "") {
    if (dedicated === "1" || dedicated === "true") {
      overrides.dedicated = true;
    } else if (dedicated === "0" || dedicated === "false") {
      overrides.dedicated = false;
    } else {
      return Effect.fail(
        new ConfigurationError({
          message: `REPLKIT_DEDICATED must be true, false, 1 or 0 (got "${env.REPLKIT_DEDICATED}")`,
        }),
      );
    }
  }

  return Effect.succeed(overrides);
};

/**
 * Validate raw settings against the schema
 */
export const parseConfig = (
  raw: unknown,
  source = "configuration",
): Effect.Effect<ReplkitConfig, ConfigurationError> => {
  const result = ReplkitConfigSchema.safeParse(raw);
  if (result.success) return Effect.succeed(result.data);

  const issues = result.error.issues.map(
    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
  );
  return Effect.fail(
    new ConfigurationError({
      message: `Invalid ${source}: ${issues.join("; ")}`,
      issues,
    }),
  );
};

/**
 * Load configuration for a directory
 */
export const loadConfig = (
  dir: string,
  env: NodeJS.ProcessEnv = process.env,
): Effect.Effect<ReplkitConfig, ConfigurationError> =>
  Effect.gen(function* () {
    const file = path.join(dir, CONFIG_FILE_NAME);
    const text = yield* readConfigFile(file);
    const fromFile = text === null ? {} : yield* parseJsonObject(file, text);
    const overrides = yield* environmentOverrides(env);

    const config = yield* parseConfig({ ...fromFile, ...overrides }, file);
    yield* Effect.logDebug(
      `[Config] Loaded ${text === null ? "defaults" : file} (interpreter: ${config.interpreter})`,
    );
    return config;
  });

// ============================================================
// Derived settings
// ============================================================

export function cellPatternsFromConfig(
  config: Pick<ReplkitConfig, "cellBoundaryPattern" | "cellBeginningPattern">,
): CellPatterns {
  return {
    boundary: new RegExp(config.cellBoundaryPattern),
    beginning: new RegExp(config.cellBeginningPattern),
  };
}

export function promptBoundaryFromConfig(
  config: Pick<ReplkitConfig, "promptPattern">,
): PromptBoundary {
  return makePromptBoundary(new RegExp(config.promptPattern));
}

/**
 * Directory a new interpreter starts in.
 * `current` is the process directory, `source` the directory of the sent
 * file (falling back to the process directory), `fixed` the configured path.
 */
export const resolveWorkingDirectory = (
  setting: WorkingDirectorySetting,
  sourcePath?: string,
  cwd: string = process.cwd(),
): Effect.Effect<string, ConfigurationError> => {
  switch (setting.mode) {
    case "current":
      return Effect.succeed(cwd);
    case "source":
      return Effect.succeed(sourcePath ? path.dirname(path.resolve(cwd, sourcePath)) : cwd);
    case "fixed":
      return setting.path
        ? Effect.succeed(path.resolve(cwd, setting.path))
        : Effect.fail(
            new ConfigurationError({
              message: 'Working directory mode "fixed" needs a path',
            }),
          );
    default:
      return Effect.fail(
        new ConfigurationError({
          message: `Unknown working directory mode: ${setting.mode}`,
        }),
      );
  }
};
