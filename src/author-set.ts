/**
 * A set of author identities compared case-insensitively.
 *
 * GitHub logins are case-insensitive, so `Octocat` and `octocat` are the same contributor. The first
 * spelling added is the one kept for display. Iteration is ordered by ordinal comparison of the
 * upper-cased values, which keeps the rendered contributor lists stable between runs.
 */
export class AuthorSet implements Iterable<string> {
  private readonly entries = new Map<string, string>();

  constructor(identities: Iterable<string> = []) {
    for (const identity of identities) {
      this.add(identity);
    }
  }

  private static keyOf(identity: string): string {
    return identity.toUpperCase();
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Adds an identity. Returns `false` if an identity differing only in case is already present.
   */
  add(identity: string): boolean {
    const key = AuthorSet.keyOf(identity);
    if (this.entries.has(key)) {
      return false;
    }
    this.entries.set(key, identity);
    return true;
  }

  has(identity: string): boolean {
    return this.entries.has(AuthorSet.keyOf(identity));
  }

  /**
   * Adds every identity from `other` to this set.
   */
  addAll(other: Iterable<string>): this {
    for (const identity of other) {
      this.add(identity);
    }
    return this;
  }

  /**
   * Returns a new set with the identities of this set that are not in `other`.
   */
  difference(other: AuthorSet): AuthorSet {
    return new AuthorSet(this.toArray().filter((identity) => !other.has(identity)));
  }

  filter(predicate: (identity: string) => boolean): AuthorSet {
    return new AuthorSet(this.toArray().filter(predicate));
  }

  toArray(): string[] {
    return Array.from(this.entries.entries())
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, identity]) => identity);
  }

  [Symbol.iterator](): Iterator<string> {
    return this.toArray()[Symbol.iterator]();
  }
}
