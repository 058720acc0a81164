/**
 * Token Counter
 *
 * Approximate token counting for the context budget. ~4 characters per
 * token, which stays within ~10% for English prose.
 */

const tokenCache = new Map<string, number>();
const MAX_CACHE_ENTRIES = 5000;

export function countTokens(text: string): number {
  if (!text) return 0;

  const cached = tokenCache.get(text);
  if (cached !== undefined) return cached;

  const count = Math.ceil(text.length / 4);

  // Only short strings are cached; rendered buckets are counted once anyway
  if (text.length < 10000) {
    if (tokenCache.size >= MAX_CACHE_ENTRIES) {
      tokenCache.clear();
    }
    tokenCache.set(text, count);
  }

  return count;
}

export function clearTokenCache(): void {
  tokenCache.clear();
}
