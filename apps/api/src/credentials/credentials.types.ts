export type CredentialState = 'valid' | 'unauthenticated';

export type UserCredential = {
  userId: string;
  accessToken: string;
  refreshToken: string;
  /** Epoch milliseconds. */
  expiresAt: number;
  state: CredentialState;
};
