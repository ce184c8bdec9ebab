import type { IdentityConfig } from '../lib/config.js';
import { defaultRandom, pick, shuffle, type Random } from '../lib/random.js';

export const USER_AGENTS: readonly string[] = [
  // Chrome on Windows
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/130.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/134.0.0.0 Safari/537.36',
  // Edge on Windows
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36 Edg/131.0.0.0',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/130.0.0.0 Safari/537.36 Edg/130.0.0.0',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/134.0.0.0 Safari/537.36 Edg/134.0.0.0',
  // Firefox on Windows
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:131.0) Gecko/20100101 Firefox/131.0',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:134.0) Gecko/20100101 Firefox/134.0',
  // Chrome on macOS
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/130.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/134.0.0.0 Safari/537.36',
  // Safari on macOS
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.6 Safari/605.1.15',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.5 Safari/605.1.15',
  // Firefox on macOS
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:131.0) Gecko/20100101 Firefox/131.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:134.0) Gecko/20100101 Firefox/134.0',
  // Edge on macOS
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36 Edg/131.0.0.0',
  // Linux
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/130.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64; rv:131.0) Gecko/20100101 Firefox/131.0',
  'Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:134.0) Gecko/20100101 Firefox/134.0',
];

export type IdentityPlatform = 'windows' | 'mac' | 'linux';

export interface IdentityDescription {
  browser: 'Chrome' | 'Edge' | 'Firefox' | 'Safari' | 'Unknown';
  majorVersion: number | null;
  platform: IdentityPlatform | 'unknown';
}

const PLATFORM_TOKENS: Record<IdentityPlatform, readonly string[]> = {
  windows: ['Windows'],
  mac: ['Macintosh'],
  linux: ['Linux', 'X11'],
};

function matchesPlatform(userAgent: string, platform: IdentityPlatform): boolean {
  return PLATFORM_TOKENS[platform].some((token) => userAgent.includes(token));
}

function majorVersion(userAgent: string, pattern: RegExp): number | null {
  const match = userAgent.match(pattern);
  return match ? parseInt(match[1], 10) : null;
}

/**
 * Browser family, major version and platform of a user agent string.
 * Used to keep the context's client hints consistent with the identity.
 */
export function describeIdentity(userAgent: string): IdentityDescription {
  const platform: IdentityDescription['platform'] = matchesPlatform(userAgent, 'windows')
    ? 'windows'
    : matchesPlatform(userAgent, 'mac')
      ? 'mac'
      : matchesPlatform(userAgent, 'linux')
        ? 'linux'
        : 'unknown';

  // Order matters: Edge also carries a Chrome token, Chrome also carries Safari
  if (userAgent.includes('Edg/')) {
    return { browser: 'Edge', majorVersion: majorVersion(userAgent, /Edg\/(\d+)/), platform };
  }
  if (userAgent.includes('Firefox/')) {
    return { browser: 'Firefox', majorVersion: majorVersion(userAgent, /Firefox\/(\d+)/), platform };
  }
  if (userAgent.includes('Chrome/')) {
    return { browser: 'Chrome', majorVersion: majorVersion(userAgent, /Chrome\/(\d+)/), platform };
  }
  if (userAgent.includes('Safari/')) {
    return { browser: 'Safari', majorVersion: majorVersion(userAgent, /Version\/(\d+)/), platform };
  }
  return { browser: 'Unknown', majorVersion: null, platform };
}

export interface IdentityRotatorOptions {
  rotate: boolean;
  random?: Random;
  userAgents?: readonly string[];
}

/**
 * Chooses the browser identity for each session. With rotation on, the
 * most recently used identities are skipped; with it off one identity is
 * pinned for the lifetime of the rotator.
 */
export class IdentityRotator {
  private readonly pool: readonly string[];
  private readonly history: string[] = [];
  private readonly random: Random;
  private readonly rotate: boolean;
  private active: string | null = null;

  constructor(private readonly config: IdentityConfig, options: IdentityRotatorOptions) {
    this.random = options.random ?? defaultRandom;
    this.rotate = options.rotate;

    const agents = options.userAgents ?? USER_AGENTS;
    const platform = config.platform;
    const filtered = platform === 'any' ? agents : agents.filter((ua) => matchesPlatform(ua, platform));
    const candidates = filtered.length > 0 ? filtered : agents;

    this.pool = shuffle(this.random, candidates).slice(0, config.poolSize);
  }

  get poolSize(): number {
    return this.pool.length;
  }

  identity(): string {
    if (!this.rotate) {
      this.active ??= pick(this.random, this.pool);
      return this.active;
    }

    const recent = this.config.excludeRecent > 0 ? this.history.slice(-this.config.excludeRecent) : [];
    const fresh = this.pool.filter((ua) => !recent.includes(ua));
    const choice = pick(this.random, fresh.length > 0 ? fresh : this.pool);

    this.history.push(choice);
    if (this.history.length > this.config.historySize) {
      this.history.shift();
    }
    this.active = choice;
    return choice;
  }

  current(): string | null {
    return this.active;
  }

  reset(): void {
    this.history.length = 0;
    this.active = null;
  }
}
