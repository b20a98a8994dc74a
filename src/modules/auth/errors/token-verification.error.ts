export type TokenFailureReason =
  | 'invalid_signature'
  | 'malformed'
  | 'expired'
  | 'kind_mismatch';

/**
 * Raised by the token codec. Callers outside the auth module never see it:
 * the session layer turns every reason into the same 401.
 */
export class TokenVerificationError extends Error {
  constructor(
    readonly reason: TokenFailureReason,
    message?: string,
  ) {
    super(message ?? `Token verification failed: ${reason}`);
    this.name = 'TokenVerificationError';
  }
}
