import { Result } from "@ashfall/contracts";
import { eq } from "drizzle-orm";
import type { PasswordHasher } from "../auth/password";
import type { Database } from "../database";
import { accounts, characters } from "../database/schema";
import {
  type Account,
  AccountError,
  type AccountStore,
  type CharacterRecord,
  type CharacterRepository,
} from "./types";

const UNIQUE_VIOLATION = "23505";

function isUniqueViolation(error: unknown): boolean {
  let current: unknown = error;
  while (typeof current === "object" && current !== null) {
    if ("code" in current && current.code === UNIQUE_VIOLATION) return true;
    current = "cause" in current ? current.cause : undefined;
  }
  return false;
}

export class PgAccountStore implements AccountStore {
  constructor(
    private readonly db: Database,
    private readonly hasher: PasswordHasher,
  ) {}

  async verify(username: string, password: string): Promise<Result<Account, AccountError>> {
    const [row] = await this.db
      .select()
      .from(accounts)
      .where(eq(accounts.username, username))
      .limit(1);

    if (!row || !(await this.hasher.verify(password, row.passwordHash))) {
      return Result.err(AccountError.invalidCredentials());
    }
    return Result.ok({ id: row.id, username: row.username });
  }

  async register(username: string, password: string): Promise<Result<Account, AccountError>> {
    const passwordHash = await this.hasher.hash(password);
    try {
      const [row] = await this.db
        .insert(accounts)
        .values({ username, passwordHash })
        .returning({ id: accounts.id, username: accounts.username });
      if (!row) throw new Error(`Insert returned no row for account ${username}`);
      return Result.ok(row);
    } catch (error) {
      if (isUniqueViolation(error)) return Result.err(AccountError.usernameTaken());
      throw error;
    }
  }

  async count(): Promise<number> {
    return this.db.$count(accounts);
  }
}

export class PgCharacterRepository implements CharacterRepository {
  constructor(private readonly db: Database) {}

  async load(accountId: number): Promise<CharacterRecord | null> {
    const [row] = await this.db
      .select()
      .from(characters)
      .where(eq(characters.accountId, accountId))
      .limit(1);
    if (!row) return null;

    const { id: _id, updatedAt: _updatedAt, ...record } = row;
    return record;
  }

  async save(record: CharacterRecord): Promise<void> {
    const { accountId: _accountId, ...values } = record;
    await this.db
      .insert(characters)
      .values(record)
      .onConflictDoUpdate({
        target: characters.accountId,
        set: { ...values, updatedAt: new Date() },
      });
  }
}
