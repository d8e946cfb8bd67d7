import { chromium, type Browser, type Page } from 'playwright-core';
import type { Viewport } from '../types.js';
import type { CapturedImage, FrameSource, FrameSourceLauncher } from './frameSource.js';

export interface PlaywrightLaunchOptions {
  label: string;
  headless: boolean;
  viewport: Viewport;
  startUrl: string;
  jpegQuality: number;
  args?: string[];
}

export class PlaywrightFrameSource implements FrameSource {
  private browser: Browser;
  private page: Page;
  private jpegQuality: number;
  readonly label: string;

  private constructor(label: string, browser: Browser, page: Page, jpegQuality: number) {
    this.label = label;
    this.browser = browser;
    this.page = page;
    this.jpegQuality = jpegQuality;
  }

  static async launch(options: PlaywrightLaunchOptions): Promise<PlaywrightFrameSource> {
    const browser = await chromium.launch({
      headless: options.headless,
      args: options.args ?? [],
    });
    try {
      const context = await browser.newContext({ viewport: options.viewport });
      const page = await context.newPage();
      await page.goto(options.startUrl);
      return new PlaywrightFrameSource(options.label, browser, page, options.jpegQuality);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  async capture(): Promise<CapturedImage> {
    const image = await this.page.screenshot({ type: 'jpeg', quality: this.jpegQuality });
    return { image, mime: 'image/jpeg' };
  }

  viewportSize(): Viewport | null {
    return this.page.viewportSize();
  }

  currentUrl(): string {
    return this.page.url();
  }

  async click(x: number, y: number): Promise<void> {
    await this.page.mouse.click(x, y);
  }

  async typeText(text: string): Promise<void> {
    await this.page.keyboard.type(text);
  }

  async pressKey(key: string): Promise<void> {
    await this.page.keyboard.press(key);
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url);
  }

  async scrollBy(deltaY: number): Promise<void> {
    await this.page.evaluate(`window.scrollBy(0, ${Number(deltaY)})`);
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

export function createPlaywrightLauncher(options: {
  viewport: Viewport;
  startUrl: string;
  jpegQuality: number;
  mirror: boolean;
}): FrameSourceLauncher {
  const shared = {
    viewport: options.viewport,
    startUrl: options.startUrl,
    jpegQuality: options.jpegQuality,
  };

  return {
    launchPrimary: () => PlaywrightFrameSource.launch({ ...shared, label: 'headless', headless: true }),
    launchMirror: options.mirror
      ? () =>
          PlaywrightFrameSource.launch({
            ...shared,
            label: 'visible',
            headless: false,
            args: ['--start-maximized'],
          })
      : undefined,
  };
}
