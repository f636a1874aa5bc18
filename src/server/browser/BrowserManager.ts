// ============================================================================
// BROWSER MANAGER - Stealth Playwright sessions, one per item
// ============================================================================

import { chromium } from 'playwright-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { Browser, BrowserContext, ElementHandle, Page, Route } from 'playwright';
import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import {
  HARVEST_BROWSER_FLAGS,
  HARVEST_VIEWPORT,
  HIDE_WEBDRIVER_SCRIPT,
  IGNORED_DEFAULT_ARGS,
  USER_AGENTS,
} from '../config/browser-flags.js';
import type { RandomSource } from '../scraper/utils/pacing.js';
import { pick } from '../scraper/utils/pacing.js';
import { errorMessage } from '../scraper/types/errors.js';
import type { SessionFactory } from '../surface/RenderingSurface.js';
import { PlaywrightSurface } from '../surface/PlaywrightSurface.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

chromium.use(StealthPlugin());

export interface BrowserSessionConfig {
  headless: boolean;
  /** Abort image requests */
  blockImages: boolean;
  userAgents: readonly string[];
}

const DEFAULT_SESSION_CONFIG: BrowserSessionConfig = {
  headless: true,
  blockImages: true,
  userAgents: USER_AGENTS,
};

export interface BrowserSession {
  id: string;
  browser: Browser;
  context: BrowserContext;
  page: Page;
  userAgent: string;
}

/**
 * Launches a fresh browser per session so no cookies or fingerprint state
 * carry over between items.
 *
 * Emits `session:created` and `session:destroyed` with `{ sessionId }`.
 */
export class BrowserManager extends EventEmitter implements SessionFactory<ElementHandle> {
  private sessions: Map<string, BrowserSession> = new Map();
  private config: BrowserSessionConfig;

  constructor(
    config: Partial<BrowserSessionConfig> = {},
    private logger: Logger = silentLogger,
    private random: RandomSource = Math.random
  ) {
    super();
    this.config = { ...DEFAULT_SESSION_CONFIG, ...config };
  }

  /**
   * SessionFactory entry point: a new session wrapped as a rendering surface
   */
  async create(): Promise<PlaywrightSurface> {
    const session = await this.createSession();
    return new PlaywrightSurface(session.page, () => this.destroySession(session.id));
  }

  async createSession(sessionId: string = uuidv4()): Promise<BrowserSession> {
    this.logger.debug(`Creating session ${sessionId}`);

    const browser = await chromium.launch({
      headless: this.config.headless,
      args: HARVEST_BROWSER_FLAGS,
      ignoreDefaultArgs: IGNORED_DEFAULT_ARGS,
    });

    try {
      const userAgent = pick(this.config.userAgents, this.random);
      const context = await browser.newContext({
        viewport: HARVEST_VIEWPORT,
        userAgent,
        permissions: [],
        javaScriptEnabled: true,
        hasTouch: false,
        isMobile: false,
        deviceScaleFactor: 1,
      });

      await context.addInitScript(HIDE_WEBDRIVER_SCRIPT);
      if (this.config.blockImages) {
        await context.route('**/*', (route) => this.filterRequest(route));
      }

      const page = await context.newPage();
      const session: BrowserSession = { id: sessionId, browser, context, page, userAgent };
      this.sessions.set(sessionId, session);
      this.setupPageListeners(session);

      this.emit('session:created', { sessionId });
      this.logger.debug(`Session ${sessionId} created`);
      return session;
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  private filterRequest(route: Route): Promise<void> {
    return route.request().resourceType() === 'image' ? route.abort() : route.continue();
  }

  private setupPageListeners(session: BrowserSession): void {
    // Dialog handling (alerts, confirms, prompts)
    session.page.on('dialog', async (dialog) => {
      try {
        await dialog.dismiss();
      } catch (error) {
        this.logger.debug(`Could not dismiss ${dialog.type()} dialog: ${errorMessage(error)}`);
      }
    });
  }

  async destroySession(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) return;

    this.logger.debug(`Destroying session ${sessionId}`);

    // Remove from map first to prevent double cleanup
    this.sessions.delete(sessionId);

    try {
      await session.context.close();
    } finally {
      await session.browser.close();
      this.emit('session:destroyed', { sessionId });
    }
  }

  /**
   * Close every open session
   */
  async shutdown(): Promise<void> {
    const results = await Promise.allSettled(
      [...this.sessions.keys()].map((id) => this.destroySession(id))
    );
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.error(`Error destroying session: ${errorMessage(result.reason)}`);
      }
    }
  }
}
