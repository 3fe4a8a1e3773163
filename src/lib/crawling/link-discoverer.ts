/**
 * Link Discoverer
 * Finds followable links on a page and assigns each one a rule role
 */

import * as cheerio from 'cheerio';
import { CompiledRule, FrontierEntry } from './crawling.types';
import { matchRule } from './crawl-rules';
import { isHttpUrl, isWithinDomain, normalizeUrl, resolveUrl } from './url-normalizer';

export class LinkDiscoverer {
  /**
   * Discover links on a page that stay inside the domain and match a rule.
   * Each URL is returned once, under the first rule that claims it.
   */
  discoverLinks(
    html: string,
    pageUrl: string,
    rules: CompiledRule[],
    domain: string,
    currentDepth: number
  ): FrontierEntry[] {
    const $ = cheerio.load(html);
    const links: FrontierEntry[] = [];
    const seen = new Set<string>();

    $('a[href], area[href]').each((_, el) => {
      const href = $(el).attr('href');
      if (!href || href.startsWith('#') || href.startsWith('javascript:')) {
        return;
      }

      const absoluteUrl = resolveUrl(href.trim(), pageUrl);
      if (!absoluteUrl || !isHttpUrl(absoluteUrl)) {
        return;
      }

      const normalized = normalizeUrl(absoluteUrl);
      if (seen.has(normalized)) {
        return;
      }
      seen.add(normalized);

      // Offsite links are never followed
      if (!isWithinDomain(normalized, domain)) {
        return;
      }

      const rule = matchRule(normalized, rules);
      if (!rule) {
        return;
      }

      links.push({
        url: normalized,
        role: rule.role,
        depth: currentDepth + 1,
        parentUrl: pageUrl,
      });
    });

    return links;
  }
}

export const linkDiscoverer = new LinkDiscoverer();
