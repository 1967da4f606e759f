import type { Result } from "@ashfall/contracts";

// =============================================================================
// Accounts
// =============================================================================

export interface Account {
  id: number;
  username: string;
}

export type AccountErrorCode = "INVALID_CREDENTIALS" | "USERNAME_TAKEN";

export class AccountError extends Error {
  readonly name = "AccountError";

  constructor(
    public readonly code: AccountErrorCode,
    message: string,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AccountError);
    }
  }

  static invalidCredentials(): AccountError {
    return new AccountError("INVALID_CREDENTIALS", "Invalid credentials");
  }

  static usernameTaken(): AccountError {
    return new AccountError("USERNAME_TAKEN", "Username already taken");
  }

  static isAccountError(error: unknown): error is AccountError {
    return error instanceof AccountError;
  }
}

export interface AccountStore {
  verify(username: string, password: string): Promise<Result<Account, AccountError>>;
  register(username: string, password: string): Promise<Result<Account, AccountError>>;
  count(): Promise<number>;
}

// =============================================================================
// Characters
// =============================================================================

/** Persisted slice of a player entity. */
export interface CharacterRecord {
  accountId: number;
  name: string;
  x: number;
  y: number;
  z: number;
  hp: number;
  mp: number;
  level: number;
  experience: number;
  experienceToNext: number;
  strength: number;
  dexterity: number;
  constitution: number;
  intelligence: number;
  maxHp: number;
  maxMp: number;
}

export interface CharacterRepository {
  load(accountId: number): Promise<CharacterRecord | null>;
  /** Insert or replace the character of `record.accountId`. */
  save(record: CharacterRecord): Promise<void>;
}
