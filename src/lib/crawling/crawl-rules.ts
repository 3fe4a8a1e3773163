/**
 * Crawl Rules
 * Compiles allow/deny rule entries and matches links against them
 */

import { CrawlError, CrawlErrorCode } from '../errors/crawl.errors';
import { CompiledRule, RuleRole, SiteRule } from './crawling.types';

function compilePattern(pattern: string | undefined, field: 'allow' | 'deny', index: number): RegExp | null {
  if (!pattern) {
    return null;
  }
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new CrawlError(
      CrawlErrorCode.INVALID_OPTIONS,
      `Rule ${index + 1} has an invalid ${field} pattern: ${pattern}`,
      { cause: error }
    );
  }
}

/**
 * Compile rules and order them traversal first, extraction second.
 * A rule without a role is traversal when it is the first entry, extraction otherwise.
 */
export function compileRules(rules: SiteRule[]): CompiledRule[] {
  const compiled = rules.map((rule, index): CompiledRule => {
    const role: RuleRole = rule.role ?? (index === 0 ? 'traversal' : 'extraction');
    return {
      allow: compilePattern(rule.allow, 'allow', index),
      deny: compilePattern(rule.deny, 'deny', index),
      role,
      source: rule,
    };
  });

  // Array.prototype.sort is stable, so configured order holds within a role
  return compiled.sort((a, b) => rankOf(a.role) - rankOf(b.role));
}

function rankOf(role: RuleRole): number {
  return role === 'traversal' ? 0 : 1;
}

/**
 * First rule claiming the URL, or null when no rule does
 */
export function matchRule(url: string, rules: CompiledRule[]): CompiledRule | null {
  for (const rule of rules) {
    if (rule.allow && !rule.allow.test(url)) {
      continue;
    }
    if (rule.deny && rule.deny.test(url)) {
      continue;
    }
    return rule;
  }
  return null;
}
