/**
 * Robots.txt Rules
 * Parses robots.txt and answers allow/disallow for a URL
 */

import { PageFetcher } from './crawling.types';

interface RobotsGroup {
  agents: string[];
  rules: Array<{ allow: boolean; pattern: string; regex: RegExp }>;
}

function patternToRegex(pattern: string): RegExp {
  const anchored = pattern.endsWith('$');
  const body = (anchored ? pattern.slice(0, -1) : pattern)
    .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*');
  return new RegExp(`^${body}${anchored ? '$' : ''}`);
}

export class RobotsRules {
  private constructor(private readonly groups: RobotsGroup[]) {}

  static allowAll(): RobotsRules {
    return new RobotsRules([]);
  }

  static parse(content: string): RobotsRules {
    const groups: RobotsGroup[] = [];
    let current: RobotsGroup | null = null;
    let lastWasAgent = false;

    for (const rawLine of content.split(/\r?\n/)) {
      const line = rawLine.replace(/#.*$/, '').trim();
      if (!line) {
        continue;
      }

      const colonIndex = line.indexOf(':');
      if (colonIndex === -1) {
        continue;
      }

      const directive = line.substring(0, colonIndex).trim().toLowerCase();
      const value = line.substring(colonIndex + 1).trim();

      if (directive === 'user-agent') {
        // Consecutive user-agent lines share one group
        if (!current || !lastWasAgent) {
          current = { agents: [], rules: [] };
          groups.push(current);
        }
        current.agents.push(value.toLowerCase());
        lastWasAgent = true;
        continue;
      }

      lastWasAgent = false;
      if (!current) {
        continue;
      }

      if ((directive === 'allow' || directive === 'disallow') && value) {
        current.rules.push({
          allow: directive === 'allow',
          pattern: value,
          regex: patternToRegex(value),
        });
      }
    }

    return new RobotsRules(groups);
  }

  /**
   * Longest matching pattern wins; allow wins a tie
   */
  isAllowed(url: string, userAgent: string): boolean {
    let path: string;
    try {
      const parsed = new URL(url);
      path = `${parsed.pathname}${parsed.search}`;
    } catch {
      return true;
    }

    const group = this.groupFor(userAgent);
    if (!group) {
      return true;
    }

    let verdict: { allow: boolean; length: number } | null = null;
    for (const rule of group.rules) {
      if (!rule.regex.test(path)) {
        continue;
      }
      const length = rule.pattern.length;
      if (!verdict || length > verdict.length || (length === verdict.length && rule.allow)) {
        verdict = { allow: rule.allow, length };
      }
    }

    return verdict ? verdict.allow : true;
  }

  private groupFor(userAgent: string): RobotsGroup | undefined {
    const ua = userAgent.toLowerCase();
    const specific = this.groups.find((group) =>
      group.agents.some((agent) => agent !== '*' && ua.includes(agent))
    );
    return specific ?? this.groups.find((group) => group.agents.includes('*'));
  }
}

/**
 * Fetch robots.txt for an origin; anything but a readable file allows everything
 */
export async function loadRobotsRules(origin: string, fetcher: PageFetcher): Promise<RobotsRules> {
  try {
    const page = await fetcher.fetch(`${origin}/robots.txt`);
    return RobotsRules.parse(page.html);
  } catch (error) {
    console.log(`robots.txt unavailable for ${origin}, allowing all: ${error instanceof Error ? error.message : String(error)}`);
    return RobotsRules.allowAll();
  }
}
