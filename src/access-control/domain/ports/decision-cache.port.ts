/**
 * Port for the access decision cache.
 *
 * Async so a shared store (e.g. Redis) can back it. Patterns use glob
 * syntax where `*` matches any run of characters.
 */
export abstract class DecisionCache {
  /**
   * @returns The cached decision, or undefined on a miss or expired entry
   */
  abstract get(key: string): Promise<boolean | undefined>;

  abstract set(key: string, value: boolean, ttlSeconds: number): Promise<void>;

  /**
   * @returns Number of entries removed
   */
  abstract deletePattern(pattern: string): Promise<number>;
}
