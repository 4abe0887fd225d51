import { z } from "zod";
import { ConfigError } from "./errors";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export const PIPE_POLICIES = ["parallel", "iterate", "pass"] as const;

export const logLevelSchema = z.enum(LOG_LEVELS);

export const loggerConfigSchema = z.object({
  level: logLevelSchema.default("warn"),
  /** "console", or a file path that lines are appended to. */
  destination: z.string().min(1).default("console"),
});

const stepSchema = z.union([
  z.string().min(1),
  z.tuple([z.string().min(1), z.array(z.string().min(1))]),
]);

export const structureSchema = z.union([
  z.array(stepSchema).min(1),
  z.record(z.string(), z.union([z.string().min(1), z.array(z.string().min(1))])),
]);

export const chartOptionsSchema = z.object({
  name: z.string().min(1),
  safeMode: z.boolean().default(false),
  maxIterations: z.number().int().positive().optional(),
});

/** Data carried by a `Chart` kind inside a node spec or a saved document. */
export const chartNodeConfigSchema = z.object({
  structure: structureSchema,
  safeMode: z.boolean().optional(),
  maxIterations: z.number().int().positive().optional(),
});

export const pipePolicySchema = z.enum(PIPE_POLICIES);

export const pipeOptionsSchema = z.object({
  name: z.string().min(1),
  policy: pipePolicySchema.default("parallel"),
  workers: z.number().int().positive().default(4),
  safeMode: z.boolean().default(true),
});

export type LogLevel = z.infer<typeof logLevelSchema>;
export type LoggerConfig = z.infer<typeof loggerConfigSchema>;
export type Step = z.infer<typeof stepSchema>;
export type Structure = z.infer<typeof structureSchema>;
export type ChartOptions = z.infer<typeof chartOptionsSchema>;
export type ChartNodeConfig = z.infer<typeof chartNodeConfigSchema>;
export type PipePolicy = z.infer<typeof pipePolicySchema>;
export type PipeOptions = z.infer<typeof pipeOptionsSchema>;

/**
 * Parse options against a schema, turning every zod issue into one line of a
 * ConfigError.
 */
export function parseOptions<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  label: string,
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      `Invalid ${label} options`,
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}

export function loadLoggerConfig(
  env: Record<string, string | undefined> = process.env,
): LoggerConfig {
  return parseOptions(
    loggerConfigSchema,
    {
      level: env.FLOWLINE_LOG_LEVEL || undefined,
      destination: env.FLOWLINE_LOG_FILE || undefined,
    },
    "logger",
  );
}
