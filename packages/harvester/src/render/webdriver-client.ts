import axios, { AxiosError, type AxiosInstance, type Method } from 'axios';
import { z } from 'zod';
import { createLogger } from '@workspace/logger';
import { RenderFailure, errorMessage } from '../errors.js';
import type { SignalBundle } from '../pipeline/types.js';
import { RenderSession, type RenderSessionInfo } from './render-session.js';
import {
  PAGE_SIGNAL_SCRIPT,
  SIGNAL_NAMES,
  SUSPICIOUS_KEYWORDS,
  pageSignalsSchema,
} from './signal-script.js';
import { createTlsProbe, type TlsProbe, type TlsVerdict } from './tls-probe.js';
import { RenderClient } from './types.js';
import {
  classifyTransportError,
  classifyWebDriverError,
  firstLine,
  type WebDriverPhase,
} from './webdriver-errors.js';

const log = createLogger('webdriver');

type BrowserName = 'chrome' | 'MicrosoftEdge' | 'firefox';

type WebDriverClientConfig = {
  endpointUrl: string;
  browserName: BrowserName;
  browserArgs: string[];
  /** Added to the page-load timeout to bound the HTTP request itself. */
  requestGraceMs: number;
  sessionCreateTimeoutMs: number;
  /** Page failures in a row after which the session is replaced; 0 disables. */
  maxConsecutivePageFailures: number;
  tlsProbe: TlsProbe | false;
  http?: AxiosInstance;
  now: () => number;
};

type EndpointStatus = {
  ready: boolean;
  message: string;
};

const BROWSER_OPTIONS_KEY: Record<BrowserName, string> = {
  chrome: 'goog:chromeOptions',
  MicrosoftEdge: 'ms:edgeOptions',
  firefox: 'moz:firefoxOptions',
};

const DEFAULT_BROWSER_ARGS: Record<BrowserName, string[]> = {
  chrome: [
    '--headless=new',
    '--no-sandbox',
    '--disable-dev-shm-usage',
    '--disable-gpu',
    '--window-size=1920,1080',
  ],
  MicrosoftEdge: ['--headless=new', '--no-sandbox', '--disable-dev-shm-usage', '--disable-gpu'],
  firefox: ['-headless'],
};

const DEFAULT_CONFIG: Omit<WebDriverClientConfig, 'browserArgs' | 'tlsProbe'> = {
  endpointUrl: 'http://localhost:4444',
  browserName: 'chrome',
  requestGraceMs: 5000,
  sessionCreateTimeoutMs: 60000,
  maxConsecutivePageFailures: 5,
  now: Date.now,
};

const NO_TLS_VERDICT: TlsVerdict = { valid: false, invalid: false };

const responseSchema = z.object({ value: z.unknown() });

const errorValueSchema = z.object({
  error: z.string(),
  message: z.string().default(''),
});

const newSessionSchema = z.object({ sessionId: z.string().min(1) });

const statusSchema = z.object({
  ready: z.boolean(),
  message: z.string().default(''),
});

/**
 * Render client speaking the W3C WebDriver protocol to a Selenium-compatible
 * endpoint. Holds at most one remote session, created on first use.
 */
class WebDriverRenderClient extends RenderClient {
  readonly signalNames: readonly string[] = SIGNAL_NAMES;
  private readonly config: WebDriverClientConfig;
  private readonly http: AxiosInstance;
  private readonly tlsProbe: TlsProbe | false;
  private session: RenderSession | undefined;
  private pageLoadTimeoutMs = 15000;

  constructor(config: Partial<WebDriverClientConfig> = {}) {
    super();
    const browserName = config.browserName ?? DEFAULT_CONFIG.browserName;
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      browserName,
      browserArgs: config.browserArgs ?? DEFAULT_BROWSER_ARGS[browserName],
      tlsProbe: config.tlsProbe ?? createTlsProbe(),
    };
    this.tlsProbe = this.config.tlsProbe;
    this.http =
      config.http ??
      axios.create({
        baseURL: this.config.endpointUrl.replace(/\/+$/, ''),
        headers: { 'Content-Type': 'application/json; charset=utf-8' },
        validateStatus: () => true,
      });
  }

  get sessionInfo(): RenderSessionInfo | undefined {
    return this.session?.info;
  }

  async render(url: string, timeoutSeconds: number): Promise<SignalBundle> {
    this.pageLoadTimeoutMs = Math.round(timeoutSeconds * 1000);
    const session = await this.ensureSession();

    try {
      const tls = this.tlsProbe ? await this.tlsProbe(url) : NO_TLS_VERDICT;

      const startedAt = this.config.now();
      await this.command(
        'post',
        `/session/${session.id}/url`,
        'navigate',
        { url },
        this.pageLoadTimeoutMs + this.config.requestGraceMs,
      );
      const pageLoadSeconds = (this.config.now() - startedAt) / 1000;

      const value = await this.command(
        'post',
        `/session/${session.id}/execute/sync`,
        'execute',
        { script: PAGE_SIGNAL_SCRIPT, args: [url, SUSPICIOUS_KEYWORDS] },
        this.pageLoadTimeoutMs + this.config.requestGraceMs,
      );

      const parsed = pageSignalsSchema.safeParse(value);
      if (!parsed.success) {
        throw new RenderFailure(
          `Signal script returned an unexpected shape for ${url}`,
          'render-error',
          parsed.error,
        );
      }

      session.markGood();
      return {
        ssl_valid: tls.valid ? 1 : 0,
        ssl_invalid: tls.invalid ? 1 : 0,
        ...parsed.data,
        page_load_time: Math.round(pageLoadSeconds * 100) / 100,
      };
    } catch (error) {
      if (error instanceof RenderFailure && error.isSessionLoss) {
        log.warn(`Session ${session.id} lost while rendering ${url}: ${error.message}`);
        session.retire();
      } else if (session.markBad()) {
        log.warn(
          `Session ${session.id} replaced after ${session.info.consecutiveFailures} page failures in a row`,
        );
        await this.deleteSession();
      }
      throw error;
    }
  }

  async refreshSession(): Promise<void> {
    await this.deleteSession();
    await this.createSession();
  }

  async close(): Promise<void> {
    await this.deleteSession();
  }

  /**
   * Readiness of the endpoint per `GET /status`. Never rejects.
   */
  async checkReady(): Promise<EndpointStatus> {
    try {
      const response = await this.http.request({
        method: 'get',
        url: '/status',
        timeout: this.config.requestGraceMs,
      });
      const body = responseSchema.safeParse(response.data);
      const status = body.success ? statusSchema.safeParse(body.data.value) : undefined;
      if (!status?.success) {
        return { ready: false, message: `Unexpected /status response (HTTP ${response.status})` };
      }
      return status.data;
    } catch (error) {
      return { ready: false, message: errorMessage(error) };
    }
  }

  private async ensureSession(): Promise<RenderSession> {
    if (!this.session?.isUsable()) {
      return this.createSession();
    }

    const session = this.session;
    if (session.pageLoadTimeoutMs !== this.pageLoadTimeoutMs) {
      try {
        await this.command(
          'post',
          `/session/${session.id}/timeouts`,
          'timeouts',
          { pageLoad: this.pageLoadTimeoutMs, script: this.pageLoadTimeoutMs },
          this.config.requestGraceMs,
        );
      } catch (error) {
        if (error instanceof RenderFailure && error.isSessionLoss) {
          session.retire();
        }
        throw error;
      }
      session.pageLoadTimeoutMs = this.pageLoadTimeoutMs;
    }

    return session;
  }

  private async createSession(): Promise<RenderSession> {
    const { browserName, browserArgs } = this.config;
    const value = await this.command(
      'post',
      '/session',
      'create-session',
      {
        capabilities: {
          alwaysMatch: {
            browserName,
            acceptInsecureCerts: true,
            pageLoadStrategy: 'normal',
            timeouts: { pageLoad: this.pageLoadTimeoutMs, script: this.pageLoadTimeoutMs },
            [BROWSER_OPTIONS_KEY[browserName]]: { args: browserArgs },
          },
        },
      },
      this.config.sessionCreateTimeoutMs,
    );

    const parsed = newSessionSchema.safeParse(value);
    if (!parsed.success) {
      throw new RenderFailure('New session response carried no session id', 'session-error');
    }

    this.session = new RenderSession(
      parsed.data.sessionId,
      this.pageLoadTimeoutMs,
      this.config.maxConsecutivePageFailures,
    );
    log.info(`Session ${parsed.data.sessionId} created (${browserName})`);
    return this.session;
  }

  private async deleteSession(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }

    this.session = undefined;
    session.retire();

    try {
      await this.command(
        'delete',
        `/session/${session.id}`,
        'delete-session',
        undefined,
        this.config.requestGraceMs,
      );
      log.debug(`Session ${session.id} deleted after ${session.info.renderCount} renders`);
    } catch (error) {
      log.warn(`Could not delete session ${session.id}: ${errorMessage(error)}`);
    }
  }

  private async command(
    method: Method,
    path: string,
    phase: WebDriverPhase,
    data: unknown,
    timeoutMs: number,
  ): Promise<unknown> {
    log.trace(`${method.toUpperCase()} ${path}`);

    let status: number;
    let payload: unknown;
    try {
      const response = await this.http.request({ method, url: path, data, timeout: timeoutMs });
      status = response.status;
      payload = response.data;
    } catch (error) {
      const code = error instanceof AxiosError ? error.code : undefined;
      throw new RenderFailure(
        `WebDriver ${phase} request failed: ${errorMessage(error)}`,
        classifyTransportError(code, phase),
        error,
      );
    }

    const body = responseSchema.safeParse(payload);
    const errorValue = body.success ? errorValueSchema.safeParse(body.data.value) : undefined;

    if (errorValue?.success) {
      const { error, message } = errorValue.data;
      throw new RenderFailure(
        `WebDriver ${phase} failed: ${error}: ${firstLine(message)}`,
        classifyWebDriverError(errorValue.data, phase),
      );
    }

    if (status >= 400 || !body.success) {
      throw new RenderFailure(
        `WebDriver ${phase} returned HTTP ${status} without a protocol body`,
        classifyTransportError(undefined, phase),
      );
    }

    return body.data.value;
  }
}

export { WebDriverRenderClient, DEFAULT_BROWSER_ARGS };
export type { WebDriverClientConfig, BrowserName, EndpointStatus };
