import { AccountId } from '../types';

export class TrustRegistry {
  private readonly trusted: ReadonlySet<AccountId>;

  constructor(ids: Iterable<AccountId>) {
    this.trusted = new Set(ids);
  }

  isTrusted(id: AccountId): boolean {
    return this.trusted.has(id);
  }

  get size(): number {
    return this.trusted.size;
  }
}
