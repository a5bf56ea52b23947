/**
 * Proxy Driver
 *
 * - Parsing proxy list lines in the supported formats
 * - Loading a proxy list file (a missing file means "no proxies")
 * - Formatting endpoints for Playwright and axios
 */

import { readFile } from 'fs/promises';
import type { ProxyEndpoint, PlaywrightProxy, AxiosProxy } from '../types/proxy.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('proxy-driver');

/**
 * Parse one proxy line. Supported formats:
 *   ip:port
 *   ip:port:user:pass
 *   http://ip:port
 *   http://user:pass@ip:port
 * @returns The endpoint, or null when the line matches none of them
 */
export function parseProxyLine(line: string): ProxyEndpoint | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  if (trimmed.startsWith('http://') && trimmed.includes('@')) {
    const match = trimmed.match(/^http:\/\/([^:]+):([^@]+)@([^:]+):(\d+)\/?$/);
    if (!match) return null;
    const [, username, password, host, port] = match;
    return { server: `http://${host}:${port}`, username, password };
  }

  if (trimmed.startsWith('http://')) {
    const match = trimmed.match(/^http:\/\/([^:/]+):(\d+)\/?$/);
    if (!match) return null;
    const [, host, port] = match;
    return { server: `http://${host}:${port}` };
  }

  const parts = trimmed.split(':');
  if (parts.length === 4 && /^\d+$/.test(parts[1])) {
    const [host, port, username, password] = parts;
    return { server: `http://${host}:${port}`, username, password };
  }
  if (parts.length === 2 && /^\d+$/.test(parts[1])) {
    const [host, port] = parts;
    return { server: `http://${host}:${port}` };
  }

  return null;
}

/**
 * Parse a list of proxy lines, skipping blanks, comments and invalid entries.
 */
export function parseProxyList(lines: readonly string[]): ProxyEndpoint[] {
  const endpoints: ProxyEndpoint[] = [];

  lines.forEach((raw, index) => {
    const line = raw.trim();
    if (!line || line.startsWith('#')) return;

    const endpoint = parseProxyLine(line);
    if (endpoint) {
      endpoints.push(endpoint);
    } else {
      log.warn(`Invalid proxy on line ${index + 1}: ${line}`);
    }
  });

  return endpoints;
}

/**
 * Load proxies from a text file, one per line.
 */
export async function loadProxyFile(path: string): Promise<ProxyEndpoint[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      log.normal(`No ${path} found. Continuing without proxy.`);
      return [];
    }
    throw error;
  }

  const endpoints = parseProxyList(content.split(/\r?\n/));
  log.normal(`Loaded ${endpoints.length} proxy configuration(s)`);
  return endpoints;
}

/**
 * Convert proxy to Playwright format
 */
export function formatProxyForPlaywright(proxy: ProxyEndpoint): PlaywrightProxy {
  return {
    server: proxy.server,
    username: proxy.username,
    password: proxy.password
  };
}

/**
 * Convert proxy to the axios request `proxy` option
 */
export function formatProxyForAxios(proxy: ProxyEndpoint): AxiosProxy {
  const url = new URL(proxy.server);
  const formatted: AxiosProxy = {
    protocol: url.protocol.replace(':', ''),
    host: url.hostname,
    port: Number(url.port || 80)
  };

  if (proxy.username !== undefined && proxy.password !== undefined) {
    formatted.auth = { username: proxy.username, password: proxy.password };
  }

  return formatted;
}

/**
 * Short label for logs that never includes credentials.
 */
export function describeProxy(proxy: ProxyEndpoint | null | undefined): string {
  if (!proxy) return 'direct';
  return new URL(proxy.server).host;
}
