import { connect } from 'node:tls';
import { createLogger } from '@workspace/logger';

const log = createLogger('tls-probe');

type TlsVerdict = {
  valid: boolean;
  invalid: boolean;
};

type TlsProbe = (url: string) => Promise<TlsVerdict>;

const NO_VERDICT: TlsVerdict = { valid: false, invalid: false };

const CERTIFICATE_ERROR_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_REVOKED',
  'CERT_UNTRUSTED',
  'CERT_REJECTED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'ERR_TLS_CERT_ALTNAME_INVALID',
]);

export function isCertificateError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }

  const { code } = error;
  if (typeof code !== 'string') {
    return false;
  }

  return CERTIFICATE_ERROR_CODES.has(code) || code.startsWith('ERR_SSL_');
}

/**
 * Target host and port for a TLS handshake, or null when the URL is not
 * https.
 */
export function tlsTarget(url: string): { host: string; port: number } | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }

  if (parsed.protocol !== 'https:' || parsed.hostname === '') {
    return null;
  }

  return { host: parsed.hostname, port: parsed.port === '' ? 443 : Number(parsed.port) };
}

/**
 * Direct handshake to the page's host. A completed handshake means a valid
 * certificate; a certificate rejection means invalid; anything else (refused,
 * timed out, plain http) gives no verdict.
 */
export function createTlsProbe(timeoutMs = 5000): TlsProbe {
  return (url) => {
    const target = tlsTarget(url);
    if (!target) {
      return Promise.resolve(NO_VERDICT);
    }

    return new Promise<TlsVerdict>((resolve) => {
      const socket = connect({
        host: target.host,
        port: target.port,
        servername: target.host,
        timeout: timeoutMs,
      });

      socket.once('secureConnect', () => {
        socket.end();
        resolve({ valid: true, invalid: false });
      });

      socket.once('timeout', () => {
        socket.destroy();
        resolve(NO_VERDICT);
      });

      socket.once('error', (error) => {
        socket.destroy();
        if (isCertificateError(error)) {
          log.debug(`Certificate rejected for ${target.host}:`, error);
          resolve({ valid: false, invalid: true });
          return;
        }
        resolve(NO_VERDICT);
      });
    });
  };
}

export type { TlsProbe, TlsVerdict };
