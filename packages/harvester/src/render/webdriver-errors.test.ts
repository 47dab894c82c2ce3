import { describe, it, expect } from 'vitest';
import {
  classifyTransportError,
  classifyWebDriverError,
  firstLine,
} from './webdriver-errors.js';

describe('classifyWebDriverError', () => {
  it('treats any create-session failure as session loss', () => {
    expect(
      classifyWebDriverError(
        { error: 'unknown error', message: 'Could not start a new session' },
        'create-session',
      ),
    ).toBe('session-error');
  });

  it('classifies invalid session id as session loss', () => {
    expect(
      classifyWebDriverError({ error: 'invalid session id', message: '' }, 'navigate'),
    ).toBe('session-error');
  });

  it('classifies "Cannot find session" messages as session loss', () => {
    expect(
      classifyWebDriverError(
        { error: 'unknown error', message: 'Cannot find session with id 42' },
        'execute',
      ),
    ).toBe('session-error');
  });

  it('classifies page load timeouts', () => {
    expect(
      classifyWebDriverError(
        { error: 'timeout', message: 'timeout: Timed out receiving message from renderer' },
        'navigate',
      ),
    ).toBe('timeout');
  });

  it('classifies net::ERR_TIMED_OUT as timeout', () => {
    expect(
      classifyWebDriverError(
        { error: 'unknown error', message: 'unknown error: net::ERR_TIMED_OUT' },
        'navigate',
      ),
    ).toBe('timeout');
  });

  it('classifies DNS failures as network errors', () => {
    expect(
      classifyWebDriverError(
        { error: 'unknown error', message: 'unknown error: net::ERR_NAME_NOT_RESOLVED' },
        'navigate',
      ),
    ).toBe('network-error');
  });

  it('classifies anything else as a render error', () => {
    expect(
      classifyWebDriverError(
        { error: 'javascript error', message: 'document is not defined' },
        'execute',
      ),
    ).toBe('render-error');
  });
});

describe('classifyTransportError', () => {
  it('treats an unreachable endpoint as session loss', () => {
    expect(classifyTransportError('ECONNREFUSED', 'navigate')).toBe('session-error');
    expect(classifyTransportError(undefined, 'execute')).toBe('session-error');
  });

  it('treats a client timeout while navigating as a page timeout', () => {
    expect(classifyTransportError('ECONNABORTED', 'navigate')).toBe('timeout');
  });

  it('treats a client timeout elsewhere as session loss', () => {
    expect(classifyTransportError('ECONNABORTED', 'create-session')).toBe('session-error');
  });
});

describe('firstLine', () => {
  it('keeps the first line and caps its length', () => {
    expect(firstLine('first\nsecond')).toBe('first');
    expect(firstLine('x'.repeat(250))).toBe(`${'x'.repeat(200)}...`);
  });
});
