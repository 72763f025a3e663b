/**
 * Browser Session - one long-lived Playwright context shared by rendered fetches
 *
 * Launch once per run, hand `context` to the ContentFetcher, close at the end.
 */

import { chromium, type Browser, type BrowserContext } from 'playwright';
import { DEFAULT_USER_AGENT } from '@prepscout/core';

export interface BrowserSessionConfig {
  headless?: boolean;
  userAgent?: string;
  viewport?: { width: number; height: number };
}

export interface BrowserSession {
  context: BrowserContext;
  close(): Promise<void>;
}

const DEFAULT_CONFIG = {
  headless: true,
  userAgent: DEFAULT_USER_AGENT,
  viewport: { width: 1920, height: 1080 },
};

export async function openBrowserSession(config: BrowserSessionConfig = {}): Promise<BrowserSession> {
  const browser: Browser = await chromium.launch({ headless: config.headless ?? DEFAULT_CONFIG.headless });
  try {
    const context = await browser.newContext({
      userAgent: config.userAgent ?? DEFAULT_CONFIG.userAgent,
      viewport: config.viewport ?? DEFAULT_CONFIG.viewport,
    });
    return {
      context,
      close: async () => {
        await context.close();
        await browser.close();
      },
    };
  } catch (error) {
    await browser.close();
    throw error;
  }
}
