/**
 * PlaywrightFormSurface: FormSurface over a live Google Forms page.
 *
 * Attaches to a Chrome started with --remote-debugging-port via
 * connectOverCDP, so the user keeps full control of the window while the
 * pipeline fills and watches it. Handles are ids into per-page Locator maps
 * that are rebuilt on every listQuestionContainers() call.
 */

import { chromium, type Browser, type Locator, type Page } from 'playwright-core';
import type { ContainerHandle, FormSurface } from './types.js';
import { FIELD_KIND_PRIORITY, emptyFieldSet, type FieldHandle, type FieldKind, type FieldSet } from '../engine/types.js';
import { getLogger } from '../monitoring/logger.js';

// ── Selectors ────────────────────────────────────────────────────────────

const CONTAINER_SELECTORS = [
  "[role='listitem']",
  '[data-params]',
  '.freebirdFormviewerViewNumberedItemContainer',
];

const LABEL_SELECTORS = [
  "[role='heading']",
  '.freebirdFormviewerComponentsQuestionBaseTitle',
  '.freebirdFormviewerComponentsQuestionBaseHeader',
];

const FIELD_SELECTORS: Record<FieldKind, string> = {
  text: "input[type='text'], input[type='email'], input[type='tel'], input[type='number']",
  textarea: 'textarea',
  radio: "[role='radio'], input[type='radio']",
  checkbox: "[role='checkbox'], input[type='checkbox']",
  select: 'select',
};

const ACTION_TIMEOUT_MS = 2_000;

export const GOOGLE_FORMS_URL_PATTERN = /docs\.google\.com\/forms\/.*\/viewform/;

// ── Implementation ──────────────────────────────────────────────────────

export class PlaywrightFormSurface implements FormSurface {
  private containers = new Map<string, Locator>();
  private fields = new Map<string, Locator>();
  private nextId = 0;

  constructor(private page: Page) {}

  /**
   * Connect to a running Chrome and pick the tab to drive: the first tab
   * matching `urlPattern`, else the most recently opened one.
   */
  static async attach(
    cdpUrl: string,
    urlPattern?: RegExp,
  ): Promise<{ surface: PlaywrightFormSurface; browser: Browser }> {
    const browser = await chromium.connectOverCDP(cdpUrl);
    const pages = browser.contexts().flatMap((ctx) => ctx.pages());
    const page =
      (urlPattern ? pages.find((p) => urlPattern.test(p.url())) : undefined) ??
      pages[pages.length - 1] ??
      (await (browser.contexts()[0] ?? (await browser.newContext())).newPage());

    getLogger().child({ component: 'PlaywrightFormSurface' }).info('Attached to Chrome', {
      tabs: pages.length,
      pageUrl: page.url(),
    });
    return { surface: new PlaywrightFormSurface(page), browser };
  }

  async listQuestionContainers(): Promise<ContainerHandle[]> {
    this.containers.clear();
    this.fields.clear();

    for (const selector of CONTAINER_SELECTORS) {
      const found = await this.page.locator(selector).all();
      if (found.length === 0) continue;
      return found.map((locator) => {
        const id = this.register(this.containers, locator);
        return { id };
      });
    }
    return [];
  }

  async extractLabel(container: ContainerHandle): Promise<string> {
    const root = this.lookup(this.containers, container.id);
    for (const selector of LABEL_SELECTORS) {
      const candidate = root.locator(selector).first();
      if ((await candidate.count()) === 0) continue;
      const text = (await candidate.innerText({ timeout: ACTION_TIMEOUT_MS })).trim();
      if (text) return text;
    }
    const all = (await root.innerText({ timeout: ACTION_TIMEOUT_MS })).trim();
    return all.split('\n')[0] ?? '';
  }

  async extractFields(container: ContainerHandle): Promise<FieldSet> {
    const root = this.lookup(this.containers, container.id);
    const set = emptyFieldSet();

    for (const kind of FIELD_KIND_PRIORITY) {
      for (const locator of await root.locator(FIELD_SELECTORS[kind]).all()) {
        const id = this.register(this.fields, locator);
        set[kind].push(await this.describe(id, kind, locator));
      }
    }
    return set;
  }

  async readFieldValue(field: FieldHandle): Promise<string> {
    const locator = this.lookup(this.fields, field.id);
    switch (field.kind) {
      case 'text':
      case 'textarea':
        return locator.inputValue({ timeout: ACTION_TIMEOUT_MS });
      case 'select': {
        const selected = locator.locator('option:checked').first();
        return (await selected.count()) === 0 ? '' : (await selected.innerText()).trim();
      }
      case 'radio':
      case 'checkbox':
        return String(await locator.isChecked({ timeout: ACTION_TIMEOUT_MS }));
    }
  }

  async setFieldValue(field: FieldHandle, value: string): Promise<boolean> {
    await this.lookup(this.fields, field.id).fill(value, { timeout: ACTION_TIMEOUT_MS });
    return true;
  }

  async clickOption(field: FieldHandle, label: string): Promise<boolean> {
    const locator = this.lookup(this.fields, field.id);
    if (field.kind === 'select') {
      const chosen = await locator.selectOption({ label }, { timeout: ACTION_TIMEOUT_MS });
      return chosen.length > 0;
    }
    await locator.click({ timeout: ACTION_TIMEOUT_MS });
    return true;
  }

  async currentPageUrl(): Promise<string> {
    const browser = this.page.context().browser();
    if (this.page.isClosed() || (browser && !browser.isConnected())) {
      throw new Error('Browser tab closed or CDP connection lost');
    }
    return this.page.url();
  }

  // ── Internal helpers ──────────────────────────────────────────────────

  private async describe(id: string, kind: FieldKind, locator: Locator): Promise<FieldHandle> {
    if (kind === 'radio' || kind === 'checkbox') {
      const label = (await locator.getAttribute('aria-label')) ?? (await locator.innerText()).trim();
      return { id, kind, label };
    }
    if (kind === 'select') {
      const options = (await locator.locator('option').allInnerTexts()).map((o) => o.trim());
      return { id, kind, options };
    }
    return { id, kind };
  }

  private register(map: Map<string, Locator>, locator: Locator): string {
    const id = `pw-${this.nextId++}`;
    map.set(id, locator);
    return id;
  }

  private lookup(map: Map<string, Locator>, id: string): Locator {
    const locator = map.get(id);
    if (!locator) throw new Error(`Stale handle ${id}`);
    return locator;
  }
}
