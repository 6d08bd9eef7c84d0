/**
 * Account types
 */

/**
 * Stored account row. `encryptedSecret` is opaque outside the cipher.
 */
export interface Account {
  id: number;
  username: string;
  externalIdentity: string;
  encryptedSecret: string;
  createdAt: string; // ISO-8601
}

/**
 * Plaintext third-party credentials, handed out for a single outbound call
 */
export interface AccountCredentials {
  externalIdentity: string;
  secret: string;
}

export interface AccountProfile {
  userId: number;
  username: string;
  externalIdentity: string;
  createdAt: string;
}

export interface AccountInput {
  username: string;
  externalIdentity: string;
  secret: string;
}

export interface AuthResult {
  userId: number;
  token: string;
}
