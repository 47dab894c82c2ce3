import { rmSync } from 'node:fs';
import { createLogger } from '@workspace/logger';
import { z } from 'zod';
import { resolveRunConfig, type RunConfig } from '../config/run-config.js';
import { ExtractionDriver } from '../driver/extraction-driver.js';
import { ConfigError, InputLoadError } from '../errors.js';
import { loadInputList } from '../input/input-list.js';
import { FailureLog } from '../observability/failure-log.js';
import { RateLimiter } from '../pacing/rate-limiter.js';
import { CheckpointStore } from '../pipeline/checkpoint-store.js';
import { ResultSink } from '../pipeline/result-sink.js';
import type { InputEntry } from '../pipeline/types.js';
import { SessionRecoveryPolicy } from '../recovery/session-recovery.js';
import type { RenderClient } from '../render/types.js';
import { WebDriverRenderClient } from '../render/webdriver-client.js';
import { flagFromCli, numberFromCli, pathFromCli } from './cli-args.js';

const log = createLogger('run');

export const runArgsSchema = z.object({
  input: pathFromCli('input'),
  output: pathFromCli('output'),
  checkpoint: pathFromCli('checkpoint'),
  failures: pathFromCli('failures'),
  config: pathFromCli('config'),
  endpoint: z.string().url('Invalid --endpoint. Provide a URL.').optional(),
  browser: z.enum(['chrome', 'MicrosoftEdge', 'firefox']).optional(),
  timeout: numberFromCli(
    z.number().positive('Invalid --timeout. Provide seconds > 0.'),
  ),
  checkpointInterval: numberFromCli(
    z.number().int().min(1, 'Invalid --checkpointInterval. Provide a positive integer.'),
  ),
  refreshInterval: numberFromCli(
    z.number().int().min(0, 'Invalid --refreshInterval. Provide an integer >= 0.'),
  ),
  maxSessionAttempts: numberFromCli(
    z.number().int().min(1, 'Invalid --maxSessionAttempts. Provide a positive integer.'),
  ),
  limit: numberFromCli(
    z.number().int().min(1, 'Invalid --limit. Provide a positive integer.'),
  ),
  noTlsProbe: flagFromCli(),
  fresh: flagFromCli(),
});

type RunArgs = z.infer<typeof runArgsSchema>;

type ClientFactory = (config: RunConfig) => RenderClient;

type RunActionDeps = {
  createClient: ClientFactory;
};

const defaultDeps: RunActionDeps = {
  createClient: (config) =>
    new WebDriverRenderClient({
      endpointUrl: config.endpointUrl,
      browserName: config.browserName,
      browserArgs: config.browserArgs,
      maxConsecutivePageFailures: config.maxConsecutivePageFailures,
      tlsProbe: config.tlsProbe ? undefined : false,
    }),
};

function toConfig(args: RunArgs): RunConfig {
  return resolveRunConfig({
    configFile: args.config,
    overrides: {
      inputPath: args.input,
      outputPath: args.output,
      checkpointPath: args.checkpoint,
      failureLogPath: args.failures,
      endpointUrl: args.endpoint,
      browserName: args.browser,
      timeoutSeconds: args.timeout,
      checkpointInterval: args.checkpointInterval,
      sessionRefreshInterval: args.refreshInterval,
      limit: args.limit,
      tlsProbe: args.noTlsProbe ? false : undefined,
      sessionRecovery: { maxAttempts: args.maxSessionAttempts },
    },
  });
}

function discardPreviousRun(config: RunConfig): void {
  log.warn(
    `--fresh: removing ${config.outputPath}, ${config.checkpointPath} and ${config.failureLogPath}`,
  );
  new CheckpointStore(config.checkpointPath).remove();
  rmSync(config.outputPath, { force: true });
  rmSync(config.failureLogPath, { force: true });
}

/**
 * Resolves configuration, loads the input list and drives one run. Returns
 * the process exit code: 0 only when every input has a result row.
 */
export async function runHarvestAction(
  args: RunArgs,
  deps: RunActionDeps = defaultDeps,
): Promise<number> {
  let config: RunConfig;
  try {
    config = toConfig(args);
  } catch (error) {
    if (error instanceof ConfigError) {
      log.error(error.message);
      return 1;
    }
    throw error;
  }

  let inputs: InputEntry[];
  try {
    inputs = loadInputList(config.inputPath, { limit: config.limit });
  } catch (error) {
    if (error instanceof InputLoadError) {
      log.error(error.message);
      return 1;
    }
    throw error;
  }

  log.info(
    `Loaded ${inputs.length} inputs from ${config.inputPath}${config.limit ? ` (limit ${config.limit})` : ''}`,
  );

  if (args.fresh) {
    discardPreviousRun(config);
  }

  const client = deps.createClient(config);
  if (client instanceof WebDriverRenderClient) {
    const status = await client.checkReady();
    if (status.ready) {
      log.info(`Endpoint ${config.endpointUrl} ready: ${status.message}`);
    } else {
      log.warn(`Endpoint ${config.endpointUrl} not ready: ${status.message}`);
    }
  }

  const driver = new ExtractionDriver(
    {
      sink: new ResultSink(config.outputPath),
      store: new CheckpointStore(config.checkpointPath),
      client,
      policy: new SessionRecoveryPolicy(config.sessionRecovery),
      rateLimiter: new RateLimiter({ requestsPerMinute: config.requestsPerMinute }),
      failureLog: new FailureLog(config.failureLogPath),
    },
    {
      timeoutSeconds: config.timeoutSeconds,
      checkpointInterval: config.checkpointInterval,
      sessionRefreshInterval: config.sessionRefreshInterval,
      progressInterval: config.progressInterval,
      maxUrlRetriesAfterSessionLoss: config.maxUrlRetriesAfterSessionLoss,
    },
  );

  try {
    const summary = await driver.run(inputs);
    return summary.exitCode;
  } catch (error) {
    log.fatal('Run ended with an unexpected error; the checkpoint and output are resumable:', error);
    return 1;
  }
}

export type { RunArgs, RunActionDeps, ClientFactory };
