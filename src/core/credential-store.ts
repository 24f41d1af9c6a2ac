/**
 * Credential Store
 *
 * Lookup abstraction over the external user store. The core never holds
 * test accounts of its own; callers inject a store.
 */

export interface StoredPrincipal {
  subject: string;
  roles: string[];
  claims: Record<string, string>;

  /** Disabled principals fail verification even with a valid credential */
  disabled?: boolean;
}

export interface CredentialStore {
  /**
   * @returns The stored principal, or undefined if the subject is unknown
   */
  lookup(subject: string): Promise<StoredPrincipal | undefined>;
}

/**
 * Read-only store backed by a Map. Intended for development and tests.
 */
export class InMemoryCredentialStore implements CredentialStore {
  private readonly principals: ReadonlyMap<string, StoredPrincipal>;

  constructor(principals: StoredPrincipal[] = []) {
    const map = new Map<string, StoredPrincipal>();
    for (const principal of principals) {
      if (map.has(principal.subject)) {
        throw new Error(`Duplicate principal in credential store: ${principal.subject}`);
      }
      map.set(principal.subject, {
        ...principal,
        roles: [...principal.roles],
        claims: { ...principal.claims },
      });
    }
    this.principals = map;
  }

  async lookup(subject: string): Promise<StoredPrincipal | undefined> {
    const principal = this.principals.get(subject);
    if (!principal) {
      return undefined;
    }
    return { ...principal, roles: [...principal.roles], claims: { ...principal.claims } };
  }

  size(): number {
    return this.principals.size;
  }
}
