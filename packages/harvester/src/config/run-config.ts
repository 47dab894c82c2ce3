import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';

const sessionRecoverySchema = z
  .object({
    maxAttempts: z.number().int().positive().default(10),
    initialDelayMs: z.number().nonnegative().default(5_000),
    multiplier: z.number().min(1).default(2),
    maxDelayMs: z.number().nonnegative().default(120_000),
  })
  .strict();

export const runConfigSchema = z
  .object({
    inputPath: z.string().min(1).default('data/input.csv'),
    outputPath: z.string().min(1).default('output/results.csv'),
    checkpointPath: z.string().min(1).default('output/checkpoint.json'),
    failureLogPath: z.string().min(1).default('output/failures.jsonl'),
    endpointUrl: z.string().url().default('http://localhost:4444'),
    browserName: z.enum(['chrome', 'MicrosoftEdge', 'firefox']).default('chrome'),
    browserArgs: z.array(z.string()).optional(),
    timeoutSeconds: z.number().positive().default(15),
    checkpointInterval: z.number().int().positive().default(100),
    sessionRefreshInterval: z.number().int().nonnegative().default(500),
    progressInterval: z.number().int().nonnegative().default(100),
    requestsPerMinute: z.number().nonnegative().default(600),
    sessionRecovery: sessionRecoverySchema.default({}),
    maxUrlRetriesAfterSessionLoss: z.number().int().nonnegative().default(1),
    maxConsecutivePageFailures: z.number().int().nonnegative().default(5),
    tlsProbe: z.boolean().default(true),
    limit: z.number().int().positive().optional(),
  })
  .strict();

type RunConfig = z.infer<typeof runConfigSchema>;

type RunConfigOverrides = Partial<Omit<RunConfig, 'sessionRecovery'>> & {
  sessionRecovery?: Partial<RunConfig['sessionRecovery']>;
};

type ResolveOptions = {
  /** JSON file whose settings sit between the defaults and the overrides. */
  configFile?: string;
  overrides?: RunConfigOverrides;
};

const layerSchema = z.record(z.string(), z.unknown());

function definedEntries(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function nestedLayer(value: unknown, source: string): Record<string, unknown> {
  if (value === undefined) {
    return {};
  }

  const parsed = layerSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: sessionRecovery in ${source} must be an object`);
  }
  return definedEntries(parsed.data);
}

function readConfigFile(configFile: string): Record<string, unknown> {
  if (!existsSync(configFile)) {
    throw new ConfigError(`Config file not found: ${configFile}`, configFile);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configFile, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Config file is not valid JSON: ${errorMessage(error)}`,
      configFile,
      error,
    );
  }

  const parsed = layerSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Config file must contain a JSON object: ${configFile}`, configFile);
  }
  return parsed.data;
}

/**
 * Defaults, then the JSON config file, then explicit overrides (CLI flags).
 * Nested recovery settings merge key by key.
 */
export function resolveRunConfig(options: ResolveOptions = {}): RunConfig {
  const fileLayer = options.configFile ? readConfigFile(options.configFile) : {};
  const overrideLayer = definedEntries(options.overrides ?? {});

  const merged = {
    ...fileLayer,
    ...overrideLayer,
    sessionRecovery: {
      ...nestedLayer(fileLayer.sessionRecovery, options.configFile ?? 'config file'),
      ...nestedLayer(overrideLayer.sessionRecovery, 'overrides'),
    },
  };

  const parsed = runConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') || '(root)';
    throw new ConfigError(
      `Invalid configuration: ${where}: ${issue?.message ?? 'invalid value'}`,
      options.configFile,
      parsed.error,
    );
  }

  return parsed.data;
}

export type { RunConfig, RunConfigOverrides };
