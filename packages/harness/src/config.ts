import { access } from "node:fs/promises";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { createJiti } from "jiti";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_CACHE_FILE } from "./identity-store.js";
import {
  DEFAULT_DEADLINE_SECONDS,
  DEFAULT_POLL_INTERVAL_SECONDS,
  DEFAULT_REQUEST_TIMEOUT_SECONDS,
} from "./run-coordinator.js";

export const CONFIG_FILE_NAME = "threadline.config.js";

const logLevelSchema = z.enum(["error", "warn", "info", "debug"]);

const threadlineConfigSchema = z.object({
  assistant: z
    .object({
      name: z.string().optional(),
      model: z.string().optional(),
      /** Relative to the working directory. Defaults to instructions.txt. */
      instructionsFile: z.string().optional(),
    })
    .optional(),
  identity: z
    .object({
      provider: z.enum(["local", "memory"]).optional(),
      cacheFile: z.string().optional(),
    })
    .optional(),
  polling: z
    .object({
      intervalSeconds: z.number().optional(),
      /** Per status request. */
      requestTimeoutSeconds: z.number().optional(),
      /** Overall cap on one run's poll loop. */
      deadlineSeconds: z.number().optional(),
    })
    .optional(),
  logging: z
    .object({
      file: z.string().optional(),
      level: logLevelSchema.optional(),
    })
    .optional(),
});

export type ThreadlineConfig = z.infer<typeof threadlineConfigSchema>;

const resolvedConfigSchema = z.object({
  assistant: z.object({
    name: z.string().min(1),
    model: z.string().min(1),
    instructionsFile: z.string().min(1),
  }),
  identity: z.object({
    provider: z.enum(["local", "memory"]),
    cacheFile: z.string().min(1),
  }),
  polling: z.object({
    intervalSeconds: z.number().positive(),
    requestTimeoutSeconds: z.number().positive(),
    deadlineSeconds: z.number().positive(),
  }),
  logging: z.object({
    file: z.string().min(1),
    level: logLevelSchema,
  }),
});

export type ResolvedConfig = z.infer<typeof resolvedConfigSchema>;

export const DEFAULT_ASSISTANT_NAME = "Personal Trainer";
export const DEFAULT_MODEL = "gpt-3.5-turbo";
export const DEFAULT_INSTRUCTIONS_FILE = "instructions.txt";
export const DEFAULT_LOG_FILE = "temp/log.log";

const readNumber = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const parseOrThrow = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T => {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }
  const issue = parsed.error.issues[0];
  const path = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
  throw new ConfigurationError(
    `Invalid configuration at ${path}: ${issue?.message ?? "unknown error"}`,
  );
};

/**
 * Merges the config file with THREADLINE_* environment overrides and the
 * built-in defaults. Environment wins over the file.
 */
export const resolveConfig = (
  config: ThreadlineConfig | undefined,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig => {
  const candidate = {
    assistant: {
      name: env.THREADLINE_ASSISTANT_NAME ?? config?.assistant?.name ?? DEFAULT_ASSISTANT_NAME,
      model: env.THREADLINE_MODEL ?? config?.assistant?.model ?? DEFAULT_MODEL,
      instructionsFile: config?.assistant?.instructionsFile ?? DEFAULT_INSTRUCTIONS_FILE,
    },
    identity: {
      provider: config?.identity?.provider ?? "local",
      cacheFile:
        env.THREADLINE_CACHE_FILE ?? config?.identity?.cacheFile ?? DEFAULT_CACHE_FILE,
    },
    polling: {
      intervalSeconds: config?.polling?.intervalSeconds ?? DEFAULT_POLL_INTERVAL_SECONDS,
      requestTimeoutSeconds:
        config?.polling?.requestTimeoutSeconds ?? DEFAULT_REQUEST_TIMEOUT_SECONDS,
      deadlineSeconds:
        readNumber(env.THREADLINE_DEADLINE_SECONDS) ??
        config?.polling?.deadlineSeconds ??
        DEFAULT_DEADLINE_SECONDS,
    },
    logging: {
      file: env.THREADLINE_LOG_FILE ?? config?.logging?.file ?? DEFAULT_LOG_FILE,
      level: env.THREADLINE_LOG_LEVEL ?? config?.logging?.level ?? "info",
    },
  };
  return parseOrThrow(resolvedConfigSchema, candidate);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const unwrapDefault = (imported: unknown): unknown =>
  isRecord(imported) && "default" in imported ? imported.default : imported;

export const loadThreadlineConfig = async (
  workingDir: string,
): Promise<ThreadlineConfig | undefined> => {
  const filePath = resolve(workingDir, CONFIG_FILE_NAME);
  try {
    await access(filePath);
  } catch {
    return undefined;
  }

  let imported: unknown;
  try {
    imported = await import(`${pathToFileURL(filePath).href}?t=${Date.now()}`);
  } catch {
    // CommonJS config files fail the native import; jiti accepts both.
    const jiti = createJiti(import.meta.url, { interopDefault: true, moduleCache: false });
    imported = await jiti.import(filePath);
  }
  const config = unwrapDefault(imported);
  return config === undefined ? undefined : parseOrThrow(threadlineConfigSchema, config);
};
