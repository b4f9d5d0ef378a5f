import { z } from "zod";

export const DEFAULT_TIMEOUT_RATE_MS = 100;
export const DEFAULT_TRANSACTION_TIMEOUT_MS = 5000;

const DurationMsSchema = z.number().int().positive();

const ClientSettingsSchema = z
  .object({
    timeoutRate: DurationMsSchema.optional(),
    defaultTimeoutMs: DurationMsSchema.optional(),
  })
  .strict();

/** Validates a caller-supplied duration in milliseconds. */
export function parseDurationMs(value: number, label: string): number {
  const parsed = DurationMsSchema.safeParse(value);
  if (!parsed.success) {
    throw new RangeError(`Invalid ${label}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

const EnvDurationSchema = z.coerce.number().pipe(DurationMsSchema);

export type ClientSettingsInput = z.input<typeof ClientSettingsSchema>;

export interface ClientSettings {
  /** Interval between deadline sweeps, in milliseconds. */
  timeoutRate: number;
  /** Deadline offset used by `start` when the caller gives neither deadline nor timeout. */
  defaultTimeoutMs: number;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function readEnvDuration(name: string, env: NodeJS.ProcessEnv): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim().length === 0) {
    return undefined;
  }
  const parsed = EnvDurationSchema.safeParse(raw.trim());
  if (!parsed.success) {
    throw new Error(`Invalid ${name}="${raw}": ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Explicit settings win over `STUNWIRE_TIMEOUT_RATE_MS`, which wins over the
 * built-in default.
 */
export function resolveClientSettings(
  input: ClientSettingsInput = {},
  env: NodeJS.ProcessEnv = process.env
): ClientSettings {
  const parsed = ClientSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid client settings: ${formatIssues(parsed.error)}`);
  }

  return {
    timeoutRate:
      parsed.data.timeoutRate ??
      readEnvDuration("STUNWIRE_TIMEOUT_RATE_MS", env) ??
      DEFAULT_TIMEOUT_RATE_MS,
    defaultTimeoutMs: parsed.data.defaultTimeoutMs ?? DEFAULT_TRANSACTION_TIMEOUT_MS,
  };
}
