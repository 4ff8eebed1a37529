/**
 * ChartSession backed by puppeteer-core.
 *
 * The session attaches to a browser that is already running with remote
 * debugging enabled and already signed in to the dashboard; logging in and
 * navigating to the chart stay with the operator. Closing the session
 * disconnects without closing the operator's browser.
 */

import fs from 'fs/promises';
import path from 'path';
import puppeteer, { Browser, Page, TimeoutError } from 'puppeteer-core';
import type { ChartRect } from '../types/telemetry';
import type { ChartSession } from './chartSession';
import { CollaboratorError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface PuppeteerSessionOptions {
  browserURL: string;
  // pick the tab whose URL contains this text; defaults to the first tab
  pageUrlMatch?: string;
}

export class PuppeteerChartSession implements ChartSession {
  private constructor(
    private readonly browser: Browser,
    private readonly page: Page
  ) {}

  static async attach(options: PuppeteerSessionOptions): Promise<PuppeteerChartSession> {
    let browser: Browser;
    try {
      browser = await puppeteer.connect({ browserURL: options.browserURL, defaultViewport: null });
    } catch (error) {
      throw CollaboratorError.wrap('browser', error, { browserURL: options.browserURL });
    }

    try {
      const pages = await browser.pages();
      const match = options.pageUrlMatch;
      const page = match ? pages.find(candidate => candidate.url().includes(match)) : pages[0];
      if (!page) {
        throw new CollaboratorError('browser', match ?
          `No open tab matches '${match}'` :
          'Browser has no open tabs', { context: { openTabs: pages.map(candidate => candidate.url()) } });
      }
      await page.bringToFront();

      logger.info(`Attached to dashboard tab ${page.url()}`, { module: 'puppeteerSession' });
      return new PuppeteerChartSession(browser, page);
    } catch (error) {
      await browser.disconnect();
      throw CollaboratorError.wrap('browser', error);
    }
  }

  async findElement(query: string, timeoutMs: number): Promise<ChartRect | null> {
    let handle;
    try {
      handle = await this.page.waitForSelector(query, { timeout: timeoutMs, visible: true });
    } catch (error) {
      if (error instanceof TimeoutError) {
        return null;
      }
      throw error;
    }
    if (!handle) {
      return null;
    }

    try {
      await handle.evaluate(element => element.scrollIntoView({ block: 'center' }));
      const box = await handle.boundingBox();
      return box ? { x: box.x, y: box.y, width: box.width, height: box.height } : null;
    } finally {
      await handle.dispose();
    }
  }

  async dispatchPointerMove(x: number, y: number): Promise<void> {
    await this.page.mouse.move(x, y);
  }

  async readVisibleText(query?: string): Promise<string | null> {
    if (!query) {
      return this.page.evaluate(() => document.body ? document.body.innerText : null);
    }

    return this.page.evaluate((selector: string) => {
      for (const element of Array.from(document.querySelectorAll(selector))) {
        const style = window.getComputedStyle(element);
        if (style.display === 'none' || style.visibility === 'hidden' || style.opacity === '0') {
          continue;
        }
        const text = element instanceof HTMLElement ? element.innerText : element.textContent;
        if (text && text.trim().length > 0) {
          return text;
        }
      }
      return null;
    }, query);
  }

  async captureScreenshot(area: ChartRect, filePath: string): Promise<void> {
    const image = await this.page.screenshot({ type: 'png', clip: area });
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, image);
  }

  async close(): Promise<void> {
    await this.browser.disconnect();
  }
}
