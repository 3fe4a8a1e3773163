/**
 * Cheerio Field Locator
 * CSS selector resolution with optional `::text` and `::attr(name)` suffixes
 */

import * as cheerio from 'cheerio';
import { FetchedPage, FieldLocator } from './extraction.types';

type SelectorMode =
  | { kind: 'text' }
  | { kind: 'ownText' }
  | { kind: 'attr'; name: string };

interface ParsedSelector {
  css: string;
  mode: SelectorMode;
}

const ATTR_SUFFIX = /::attr\(([^)]+)\)\s*$/;
const TEXT_SUFFIX = /::text\s*$/;

export function parseSelector(selector: string): ParsedSelector {
  const attrMatch = selector.match(ATTR_SUFFIX);
  if (attrMatch) {
    return {
      css: selector.slice(0, attrMatch.index).trim(),
      mode: { kind: 'attr', name: attrMatch[1].trim() },
    };
  }

  if (TEXT_SUFFIX.test(selector)) {
    return { css: selector.replace(TEXT_SUFFIX, '').trim(), mode: { kind: 'ownText' } };
  }

  return { css: selector.trim(), mode: { kind: 'text' } };
}

export class CheerioFieldLocator implements FieldLocator {
  // One parse per page, shared by every field lookup on it
  private documents = new WeakMap<FetchedPage, cheerio.CheerioAPI>();

  locate(selector: string, page: FetchedPage): string | null {
    const values = this.locateAll(selector, page, 1);
    return values.length > 0 ? values[0] : null;
  }

  locateAll(selector: string, page: FetchedPage, limit: number): string[] {
    const { css, mode } = parseSelector(selector);
    if (!css || limit <= 0) {
      return [];
    }

    const $ = this.load(page);
    const results: string[] = [];

    $(css).each((_, element) => {
      if (results.length >= limit) {
        return false;
      }

      const $el = $(element);
      let value: string | undefined;

      switch (mode.kind) {
        case 'attr':
          value = $el.attr(mode.name);
          break;
        case 'ownText':
          value = $el
            .contents()
            .filter((_, node) => node.nodeType === 3)
            .text();
          break;
        default:
          value = $el.text();
      }

      if (value && value.trim()) {
        results.push(value);
      }
      return undefined;
    });

    return results;
  }

  private load(page: FetchedPage): cheerio.CheerioAPI {
    let $ = this.documents.get(page);
    if (!$) {
      $ = cheerio.load(page.html);
      this.documents.set(page, $);
    }
    return $;
  }
}

export const cheerioFieldLocator = new CheerioFieldLocator();
