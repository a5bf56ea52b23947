import type { Browser } from 'playwright';
import type { ProxyEndpoint } from './proxy.js';

/**
 * Anything the browser pool can hold: an identity plus a way to tear it down.
 */
export interface PoolableSession {
  readonly id: string;
  cleanup: () => Promise<void>;
}

export interface SessionOptions {
  proxy?: ProxyEndpoint;
  headless?: boolean;  // Defaults to true
  userAgent?: string;
}

/**
 * A launched local Chromium. The proxy and user agent are applied per context.
 */
export interface Session extends PoolableSession {
  provider: 'local';
  browser: Browser;
  proxy?: ProxyEndpoint;
  userAgent?: string;
  createdAt: Date;
}

export interface BrowserPoolStats {
  capacity: number;
  size: number;
  idle: number;
  inUse: number;
  waiting: number;
  created: number;
  destroyed: number;
}
