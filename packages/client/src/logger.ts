import { pino, type Logger as PinoLogger } from "pino";
import { z } from "zod";

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);
export const LogFormatSchema = z.enum(["pretty", "json"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

export type Logger = PinoLogger;

function readEnv<T>(schema: z.ZodType<T>, value: string | undefined): T | undefined {
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }
  const parsed = schema.safeParse(value.trim().toLowerCase());
  return parsed.success ? parsed.data : undefined;
}

export function resolveLogConfig(
  overrides: Partial<ResolvedLogConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedLogConfig {
  const envLevel = readEnv(LogLevelSchema, env.STUNWIRE_LOG);
  const envFormat = readEnv(LogFormatSchema, env.STUNWIRE_LOG_FORMAT);

  return {
    level: envLevel ?? overrides.level ?? "info",
    format: envFormat ?? overrides.format ?? "json",
  };
}

export function createRootLogger(overrides: Partial<ResolvedLogConfig> = {}): Logger {
  const config = resolveLogConfig(overrides);

  const transport =
    config.format === "pretty"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true,
            ignore: "pid,hostname",
          },
        }
      : undefined;

  return pino({
    name: "stunwire",
    level: config.level,
    transport,
  });
}

export function createChildLogger(parent: Logger, name: string): Logger {
  return parent.child({ name });
}
