/**
 * Fail-fast exclusive locks keyed by string, held by an owner token.
 * An owner may re-acquire keys it already holds.
 */
export class KeyedLock {
  private readonly holders = new Map<string, symbol>();

  tryAcquire(key: string, owner: symbol): boolean {
    const holder = this.holders.get(key);
    if (holder !== undefined && holder !== owner) {
      return false;
    }

    this.holders.set(key, owner);
    return true;
  }

  releaseAll(owner: symbol): void {
    for (const [key, holder] of this.holders) {
      if (holder === owner) {
        this.holders.delete(key);
      }
    }
  }

  isHeld(key: string): boolean {
    return this.holders.has(key);
  }

  get size(): number {
    return this.holders.size;
  }
}
