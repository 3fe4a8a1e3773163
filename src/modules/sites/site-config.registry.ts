/**
 * Site Config Registry
 * Loads site configurations from the sites JSON file and resolves them
 * into walk targets
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { env } from '../../config/env';
import { CrawlError, CrawlErrorCode, getErrorMessage } from '../../lib/errors/crawl.errors';
import { RuleRole, SiteRule, WalkTarget } from '../../lib/crawling/crawling.types';
import { CrawlerType } from '../crawl/crawl.types';

export interface ResolvedSite {
  siteId: string;
  crawlerType: CrawlerType;
  target: WalkTarget;
}

/**
 * Entry keys as written in the sites file:
 * { id, source_name, domain, start_url, crawler_type?, rules: [{ allow, deny?, role? }],
 *   title_selector, description_selector?, tags_selector? }
 */
type RawEntry = Record<string, unknown>;

const REQUIRED_SITE_FIELDS = ['start_url', 'domain', 'source_name', 'rules', 'title_selector'] as const;

function isRecord(value: unknown): value is RawEntry {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRuleRole(value: unknown): value is RuleRole {
  return value === 'traversal' || value === 'extraction';
}

function optionalString(entry: RawEntry, key: string): string | undefined {
  const value = entry[key];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function isPresent(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return typeof value === 'string' ? value.trim().length > 0 : value !== undefined && value !== null;
}

export class SiteConfigRegistry {
  private entries: RawEntry[] | null;

  /**
   * @param source - path of the sites file, or entries already in memory
   */
  constructor(private readonly source: string | unknown[] = env.SITE_CONFIG_PATH) {
    this.entries = Array.isArray(source) ? source.filter(isRecord) : null;
  }

  /**
   * Resolve a site by id or source name.
   * Throws ConfigNotFound for unknown sites and incomplete entries,
   * InvalidOptions for crawler types other than static.
   */
  async resolve(siteId: string): Promise<ResolvedSite> {
    const entries = await this.load();
    const entry = entries.find(
      (candidate) => String(candidate.id) === siteId || candidate.source_name === siteId
    );

    if (!entry) {
      throw new CrawlError(CrawlErrorCode.CONFIG_NOT_FOUND, `Site config not found: ${siteId}`);
    }

    for (const field of REQUIRED_SITE_FIELDS) {
      if (!isPresent(entry[field])) {
        throw new CrawlError(CrawlErrorCode.CONFIG_NOT_FOUND, `Missing required config field: ${field}`, {
          details: { siteId, field },
        });
      }
    }

    const crawlerType = entry.crawler_type ?? CrawlerType.STATIC;
    if (crawlerType !== CrawlerType.STATIC) {
      throw new CrawlError(CrawlErrorCode.INVALID_OPTIONS, `Unsupported crawler type: ${String(crawlerType)}`, {
        details: { siteId },
      });
    }

    const startUrl = optionalString(entry, 'start_url');
    const domain = optionalString(entry, 'domain');
    const sourceName = optionalString(entry, 'source_name');
    const titleSelector = optionalString(entry, 'title_selector');
    if (!startUrl || !domain || !sourceName || !titleSelector) {
      throw new CrawlError(CrawlErrorCode.CONFIG_NOT_FOUND, `Site config ${siteId} has non-string required fields`);
    }

    return {
      siteId: String(entry.id ?? sourceName),
      crawlerType: CrawlerType.STATIC,
      target: {
        startUrl,
        domain,
        sourceName,
        rules: this.parseRules(entry.rules, siteId),
        selectors: {
          title: titleSelector,
          description: optionalString(entry, 'description_selector'),
          tags: optionalString(entry, 'tags_selector'),
        },
      },
    };
  }

  private parseRules(value: unknown, siteId: string): SiteRule[] {
    if (!Array.isArray(value)) {
      throw new CrawlError(CrawlErrorCode.CONFIG_NOT_FOUND, `Missing required config field: rules`, {
        details: { siteId, field: 'rules' },
      });
    }

    return value.map((rule, index): SiteRule => {
      if (!isRecord(rule)) {
        throw new CrawlError(CrawlErrorCode.INVALID_OPTIONS, `Rule ${index + 1} of ${siteId} is not an object`);
      }
      if (rule.role !== undefined && !isRuleRole(rule.role)) {
        throw new CrawlError(CrawlErrorCode.INVALID_OPTIONS, `Rule ${index + 1} of ${siteId} has an unknown role`);
      }
      return {
        allow: typeof rule.allow === 'string' ? rule.allow : '',
        deny: typeof rule.deny === 'string' && rule.deny ? rule.deny : undefined,
        role: isRuleRole(rule.role) ? rule.role : undefined,
      };
    });
  }

  private async load(): Promise<RawEntry[]> {
    if (this.entries) {
      return this.entries;
    }

    const filePath = path.resolve(typeof this.source === 'string' ? this.source : env.SITE_CONFIG_PATH);
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(filePath, 'utf8'));
    } catch (error) {
      console.error(`Error loading site configs from ${filePath}: ${getErrorMessage(error)}`);
      throw new CrawlError(CrawlErrorCode.CONFIG_NOT_FOUND, `Site configs unavailable: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    if (!Array.isArray(parsed)) {
      throw new CrawlError(CrawlErrorCode.CONFIG_NOT_FOUND, `Site configs in ${filePath} must be a JSON array`);
    }

    this.entries = parsed.filter(isRecord);
    console.log(`Loaded ${this.entries.length} site configs from ${filePath}`);
    return this.entries;
  }
}

export const siteConfigRegistry = new SiteConfigRegistry();
