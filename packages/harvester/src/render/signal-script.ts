import { z } from 'zod';

export const SUSPICIOUS_KEYWORDS = [
  'login', 'signin', 'password', 'bank', 'paypal', 'amazon', 'google',
  'facebook', 'apple', 'microsoft', 'secure', 'verify', 'account',
  'suspended', 'urgent', 'immediate', 'click', 'winner', 'congratulations',
  'free', 'prize', 'offer', 'limited', 'expire', 'confirm', 'update',
  'billing', 'payment', 'credit', 'card', 'ssn', 'social', 'security',
] as const;

export const SIGNAL_NAMES = [
  'ssl_valid',
  'ssl_invalid',
  'redirects',
  'forms',
  'password_fields',
  'iframes',
  'scripts',
  'suspicious_keywords',
  'external_requests',
  'num_events',
  'title_length',
  'page_load_time',
] as const;

const MAX_LINKS_INSPECTED = 50;

/**
 * Runs inside the page through `execute/sync`. Receives the requested URL and
 * the keyword list as `arguments[0]` and `arguments[1]`.
 */
export const PAGE_SIGNAL_SCRIPT = `
const requested = arguments[0];
const keywords = arguments[1];
const requestedHost = new URL(requested).host.toLowerCase();
const count = (selector) => document.querySelectorAll(selector).length;
const source = document.documentElement ? document.documentElement.outerHTML.toLowerCase() : '';

const finalUrl = window.location.href;
const sameUrl = finalUrl === requested || finalUrl === requested + '/' || requested === finalUrl + '/';

let external = 0;
const links = Array.from(document.getElementsByTagName('a')).slice(0, ${MAX_LINKS_INSPECTED});
for (const link of links) {
  const href = link.href;
  if (!href || !href.startsWith('http')) continue;
  try {
    const host = new URL(href).host.toLowerCase();
    if (host && host !== requestedHost) external += 1;
  } catch (error) {
    continue;
  }
}

const forms = count('form');
const passwordFields = count("input[type='password']");

return {
  redirects: sameUrl ? 0 : 1,
  forms: forms,
  password_fields: passwordFields,
  iframes: count('iframe'),
  scripts: count('script'),
  suspicious_keywords: keywords.filter((keyword) => source.includes(keyword)).length,
  external_requests: external,
  num_events: forms + passwordFields + count('button') + count('input'),
  title_length: (document.title || '').length,
};
`;

const count = z.number().int().nonnegative();

export const pageSignalsSchema = z.object({
  redirects: count,
  forms: count,
  password_fields: count,
  iframes: count,
  scripts: count,
  suspicious_keywords: count,
  external_requests: count,
  num_events: count,
  title_length: count,
});

export type PageSignals = z.infer<typeof pageSignalsSchema>;
export type SignalName = (typeof SIGNAL_NAMES)[number];
