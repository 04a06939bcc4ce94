/**
 * Randomized browser-like request headers
 */

export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36',
] as const;

export const ACCEPT_LANGUAGES = ['es-ES', 'en-US', 'en-GB'] as const;

export function pick<T>(items: readonly [T, ...T[]], random: () => number): T {
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index] ?? items[0];
}

export function browserHeaders(random: () => number, accept: string): Record<string, string> {
  return {
    'User-Agent': pick(USER_AGENTS, random),
    'Accept': accept,
    'Accept-Language': pick(ACCEPT_LANGUAGES, random),
  };
}
