import type { FailureKind } from '../errors.js';

type WebDriverPhase = 'create-session' | 'timeouts' | 'navigate' | 'execute' | 'delete-session';

type WebDriverErrorBody = {
  error: string;
  message: string;
};

const SESSION_LOSS_ERRORS = new Set(['invalid session id', 'session not created']);
const TIMEOUT_ERRORS = new Set(['timeout', 'script timeout']);

const SESSION_LOSS_MESSAGES = [
  'cannot find session',
  'no such session',
  'session deleted',
  'chrome not reachable',
  'browser has closed',
  'disconnected: not connected to devtools',
];

const CLIENT_TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Maps a W3C WebDriver error response onto an outcome. Any failure while a
 * session is being created means the endpoint cannot serve us at all.
 */
export function classifyWebDriverError(
  body: WebDriverErrorBody,
  phase: WebDriverPhase,
): FailureKind {
  if (phase === 'create-session') {
    return 'session-error';
  }

  const error = body.error.toLowerCase();
  const message = body.message.toLowerCase();

  if (
    SESSION_LOSS_ERRORS.has(error) ||
    SESSION_LOSS_MESSAGES.some((fragment) => message.includes(fragment))
  ) {
    return 'session-error';
  }

  if (TIMEOUT_ERRORS.has(error) || message.includes('net::err_timed_out')) {
    return 'timeout';
  }

  if (message.includes('net::err_') || error === 'insecure certificate') {
    return 'network-error';
  }

  return 'render-error';
}

/**
 * Maps a request that never got an HTTP response. The endpoint being
 * unreachable is a session problem; a client-side timeout while navigating is
 * the page taking too long.
 */
export function classifyTransportError(
  code: string | undefined,
  phase: WebDriverPhase,
): FailureKind {
  if (code !== undefined && CLIENT_TIMEOUT_CODES.has(code) && phase === 'navigate') {
    return 'timeout';
  }

  return 'session-error';
}

export function firstLine(message: string): string {
  const line = message.split('\n', 1)[0] ?? '';
  return line.length > 200 ? `${line.slice(0, 200)}...` : line;
}

export type { WebDriverPhase, WebDriverErrorBody };
