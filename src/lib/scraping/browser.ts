import { chromium, Locator, Page } from "playwright";

const LAUNCH_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--no-sandbox",
  "--disable-setuid-sandbox",
  "--disable-dev-shm-usage",
  "--disable-gpu",
];

const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const VIEWPORT = { width: 1920, height: 1080 };
const ELEMENT_TIMEOUT_MS = 15000;

export interface InputHandle {
  clear(): Promise<void>;
  type(text: string): Promise<void>;
  pressEnter(): Promise<void>;
}

/**
 * The slice of a browser page the price extractor drives. One session owns
 * one browser process.
 */
export interface BrowserSession {
  navigate(url: string): Promise<void>;
  findFirst(selector: string): Promise<InputHandle | null>;
  scrollToBottom(): Promise<void>;
  content(): Promise<string>;
  close(): Promise<void>;
}

export type SessionFactory = () => Promise<BrowserSession>;

class LocatorInput implements InputHandle {
  constructor(private locator: Locator) {}

  async clear(): Promise<void> {
    await this.locator.clear();
  }

  async type(text: string): Promise<void> {
    await this.locator.pressSequentially(text);
  }

  async pressEnter(): Promise<void> {
    await this.locator.press("Enter");
  }
}

class PlaywrightSession implements BrowserSession {
  constructor(
    private page: Page,
    private closeBrowser: () => Promise<void>
  ) {}

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "load", timeout: ELEMENT_TIMEOUT_MS });
  }

  async findFirst(selector: string): Promise<InputHandle | null> {
    const locator = this.page.locator(selector);
    if ((await locator.count()) === 0) return null;
    return new LocatorInput(locator.first());
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async close(): Promise<void> {
    await this.closeBrowser();
  }
}

/**
 * Launch a fresh headless Chromium for a single extraction. Nothing is
 * shared between sessions.
 */
export const launchSession: SessionFactory = async () => {
  const browser = await chromium.launch({ headless: true, args: LAUNCH_ARGS });
  try {
    const ctx = await browser.newContext({ userAgent: USER_AGENT, viewport: VIEWPORT });
    const page = await ctx.newPage();
    page.setDefaultTimeout(ELEMENT_TIMEOUT_MS);
    return new PlaywrightSession(page, () => browser.close());
  } catch (error) {
    await browser.close().catch((err: unknown) => {
      console.warn(
        "[browser] Failed to close browser after launch error:",
        err instanceof Error ? err.message : err
      );
    });
    throw error;
  }
};

/**
 * Run `fn` against a new session and close it afterwards on every path.
 */
export async function withSession<T>(
  factory: SessionFactory,
  fn: (session: BrowserSession) => Promise<T>
): Promise<T> {
  const session = await factory();
  try {
    return await fn(session);
  } finally {
    await session.close().catch((err: unknown) => {
      console.warn(
        "[browser] Failed to close session:",
        err instanceof Error ? err.message : err
      );
    });
  }
}
