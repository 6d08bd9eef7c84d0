/**
 * Account orchestration: registration, login and credential lookup
 */

import type { Logger } from "pino";
import type {
  AccountCredentials,
  AccountInput,
  AccountProfile,
  AuthResult,
} from "@credvault/shared";
import { DecryptionError, InvalidCredentialsError } from "../errors.js";
import { AccountInputSchema, parseOrThrow } from "../schemas/account.schemas.js";
import { generateSigningSecret, safeEqual, type CredentialCipher } from "./crypto.js";
import type { TokenIssuer } from "./token-issuer.js";
import type { UserStore } from "./user-store.js";

export interface AccountServiceDeps {
  store: UserStore;
  cipher: CredentialCipher;
  tokens: TokenIssuer;
  log: Logger;
}

export class AccountService {
  private store: UserStore;
  private cipher: CredentialCipher;
  private tokens: TokenIssuer;
  private log: Logger;
  // Sealed random value opened for unknown usernames
  private decoySecret: string;

  constructor(deps: AccountServiceDeps) {
    this.store = deps.store;
    this.cipher = deps.cipher;
    this.tokens = deps.tokens;
    this.log = deps.log;
    this.decoySecret = this.cipher.encrypt(generateSigningSecret());
  }

  /**
   * Create an account and issue its first session token.
   * @throws ValidationError on a malformed field
   * @throws DuplicateUsernameError when the username is taken
   */
  async register(input: AccountInput): Promise<AuthResult> {
    const { username, externalIdentity, secret } = parseOrThrow(AccountInputSchema, input);

    const encryptedSecret = this.cipher.encrypt(secret);
    const userId = this.store.insert(username, externalIdentity, encryptedSecret);
    const token = await this.tokens.issue(userId);

    this.log.info({ userId, username }, "Account registered");
    return { userId, token };
  }

  /**
   * Check the supplied identity and secret against the stored account.
   * Every failure, including an unreadable stored secret, is reported as
   * InvalidCredentialsError.
   */
  async login(input: AccountInput): Promise<AuthResult> {
    const account = this.store.findByUsername(input.username);

    // Unknown usernames go through the same decrypt and compare steps
    let storedSecret: string;
    try {
      storedSecret = this.cipher.decrypt(account?.encryptedSecret ?? this.decoySecret);
    } catch (error) {
      if (!(error instanceof DecryptionError)) {
        throw error;
      }
      this.log.error({ userId: account?.id, err: error }, "Stored secret could not be decrypted");
      throw new InvalidCredentialsError();
    }

    // Evaluate both so a wrong identity costs the same as a wrong secret
    const identityMatches = safeEqual(input.externalIdentity, account?.externalIdentity ?? "");
    const secretMatches = safeEqual(input.secret, storedSecret);
    if (!account || !identityMatches || !secretMatches) {
      throw new InvalidCredentialsError();
    }

    const token = await this.tokens.issue(account.id);
    this.log.info({ userId: account.id }, "Login succeeded");
    return { userId: account.id, token };
  }

  /**
   * Plaintext third-party credentials for one outbound call. Callers must
   * not cache or log the result.
   * @throws DecryptionError when the stored secret cannot be opened
   */
  getCredentialsForUser(userId: number): AccountCredentials | null {
    const account = this.store.findById(userId);
    if (!account) {
      return null;
    }

    try {
      return {
        externalIdentity: account.externalIdentity,
        secret: this.cipher.decrypt(account.encryptedSecret),
      };
    } catch (error) {
      this.log.error({ userId, err: error }, "Failed to decrypt credentials");
      throw error;
    }
  }

  getProfile(userId: number): AccountProfile | null {
    const account = this.store.findById(userId);
    if (!account) {
      return null;
    }

    return {
      userId: account.id,
      username: account.username,
      externalIdentity: account.externalIdentity,
      createdAt: account.createdAt,
    };
  }
}
