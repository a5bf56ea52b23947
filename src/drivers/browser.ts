import { randomUUID } from 'crypto';
import { chromium } from 'playwright';
import type { Page } from 'playwright';
import type { Session, SessionOptions } from '../types/session.js';
import type { FullRenderer, FullRenderOptions, FullRenderResult } from '../types/fetch.js';
import { formatProxyForPlaywright } from './proxy.js';
import { classifyError, RenderFault } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('browser');

/**
 * Selectors for cookie banners, newsletter modals and age gates that hide
 * page content until dismissed.
 */
const POPUP_CLOSE_SELECTORS = [
  'button:has-text("Accept all")',
  'button:has-text("Accept cookies")',
  'button:has-text("Allow all")',
  'button:has-text("Accept")',
  'button:has-text("I agree")',
  'button:has-text("Got it")',
  'button:has-text("OK")',
  'button:has-text("Close")',
  'button:has-text("Dismiss")',
  '#accept-cookies',
  '.cookie-accept',
  '[aria-label="Close"]',
  '[aria-label="Dismiss"]',
  'button.close',
  '.modal-close',
  '.popup-close'
];

/**
 * Launch a local Chromium for the browser pool.
 */
export async function createLocalSession(options: SessionOptions = {}): Promise<Session> {
  const browser = await chromium.launch({
    headless: options.headless ?? true,
    args: ['--disable-dev-shm-usage', '--disable-gpu', '--no-first-run']
  });

  const id = `local-${randomUUID().slice(0, 8)}`;

  browser.on('disconnected', () => {
    log.debug(`Browser ${id} disconnected`);
  });

  return {
    id,
    provider: 'local',
    browser,
    proxy: options.proxy,
    userAgent: options.userAgent,
    createdAt: new Date(),
    cleanup: async () => {
      if (browser.isConnected()) {
        await browser.close();
      }
    }
  };
}

/**
 * Click away common overlays, then press Escape for the rest.
 * Overlays are optional, so a selector that is missing or not clickable is
 * passed over.
 */
export async function dismissPopups(page: Page): Promise<number> {
  let clicked = 0;

  for (const selector of POPUP_CLOSE_SELECTORS) {
    const target = page.locator(selector).first();
    const visible = await target.isVisible().catch(() => false);
    if (!visible) continue;

    const didClick = await target.click({ timeout: 2000 }).then(() => true, () => false);
    if (didClick) {
      clicked++;
      await page.waitForTimeout(300);
    }
  }

  await page.keyboard.press('Escape').catch(() => undefined);

  if (clicked > 0) {
    log.debug(`Closed ${clicked} popup(s) on ${page.url()}`);
  }
  return clicked;
}

/**
 * Scroll down half a viewport at a time to trigger lazy-loaded content,
 * then return to the top.
 */
export async function scrollToBottom(page: Page, stepDelayMs = 150, maxSteps = 60): Promise<void> {
  await page.evaluate(async ({ stepDelayMs, maxSteps }) => {
    const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));
    const increment = Math.max(200, Math.floor(window.innerHeight / 2));
    let position = 0;

    for (let step = 0; step < maxSteps && position < document.body.scrollHeight; step++) {
      position += increment;
      window.scrollTo(0, position);
      await delay(stepDelayMs);
    }

    window.scrollTo(0, 0);
  }, { stepDelayMs, maxSteps });
}

/**
 * Full render backend: navigates a fresh context of a pooled Chromium,
 * clears overlays, scrolls, and snapshots the HTML and DOM text before the
 * context is closed.
 */
export class PlaywrightRenderer implements FullRenderer<Session> {
  async renderFull(session: Session, url: string, options: FullRenderOptions): Promise<FullRenderResult> {
    const context = await session.browser.newContext({
      userAgent: session.userAgent ?? options.userAgent,
      proxy: session.proxy ? formatProxyForPlaywright(session.proxy) : undefined,
      ignoreHTTPSErrors: true
    }).catch((error: unknown) => {
      throw classifyError(error, 'browser');
    });

    try {
      const page = await context.newPage();
      page.setDefaultTimeout(options.timeoutMs);

      const response = await page.goto(url, { waitUntil: 'networkidle', timeout: options.timeoutMs });
      const status = response?.status() ?? 0;
      if (status === 404 || status === 410) {
        throw new RenderFault(`HTTP ${status} for ${url}`, 'unreachable');
      }

      await dismissPopups(page);
      await scrollToBottom(page);
      await dismissPopups(page);

      const html = await page.content();
      const domText = await page.innerText('body').catch(() => '');

      return { html, finalUrl: page.url(), domText };
    } catch (error) {
      throw classifyError(error, 'browser');
    } finally {
      await context.close().catch((error: unknown) => {
        log.debug(`Failed to close context for ${url}`, error);
      });
    }
  }
}
