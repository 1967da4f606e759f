import { Result } from "@ashfall/contracts";
import type { PasswordHasher } from "../auth/password";
import {
  type Account,
  AccountError,
  type AccountStore,
  type CharacterRecord,
  type CharacterRepository,
} from "./types";

interface StoredAccount extends Account {
  passwordHash: string;
}

/**
 * Process-local accounts. Used when no database is configured, and in tests.
 */
export class InMemoryAccountStore implements AccountStore {
  private readonly accounts = new Map<string, StoredAccount>();
  private nextId = 1;

  constructor(private readonly hasher: PasswordHasher) {}

  async verify(username: string, password: string): Promise<Result<Account, AccountError>> {
    const account = this.accounts.get(username);
    if (!account || !(await this.hasher.verify(password, account.passwordHash))) {
      return Result.err(AccountError.invalidCredentials());
    }
    return Result.ok({ id: account.id, username: account.username });
  }

  async register(username: string, password: string): Promise<Result<Account, AccountError>> {
    if (this.accounts.has(username)) {
      return Result.err(AccountError.usernameTaken());
    }
    const passwordHash = await this.hasher.hash(password);
    // Re-check: another registration may have finished while hashing.
    if (this.accounts.has(username)) {
      return Result.err(AccountError.usernameTaken());
    }

    const account: StoredAccount = { id: this.nextId++, username, passwordHash };
    this.accounts.set(username, account);
    return Result.ok({ id: account.id, username });
  }

  async count(): Promise<number> {
    return this.accounts.size;
  }
}

export class InMemoryCharacterRepository implements CharacterRepository {
  private readonly records = new Map<number, CharacterRecord>();

  async load(accountId: number): Promise<CharacterRecord | null> {
    const record = this.records.get(accountId);
    return record ? { ...record } : null;
  }

  async save(record: CharacterRecord): Promise<void> {
    this.records.set(record.accountId, { ...record });
  }

  get size(): number {
    return this.records.size;
  }
}
