import { Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { JsonWebTokenError, TokenExpiredError } from 'jsonwebtoken';
import { randomUUID } from 'crypto';
import { TokenKind, isTokenKind } from '../enums/token-kind.enum';
import {
  TokenFailureReason,
  TokenVerificationError,
} from '../errors/token-verification.error';
import {
  IssuedToken,
  SessionTokenPayload,
} from '../interfaces/session-token.interface';

// jsonwebtoken reports signature problems only through the message text
const SIGNATURE_ERRORS = new Set([
  'invalid signature',
  'invalid algorithm',
  'jwt signature is required',
]);

/**
 * Signs and verifies session tokens. Stateless: everything needed to check a
 * token (subject, kind, expiry, jti) travels inside the signed payload.
 */
@Injectable()
export class TokenCodecService {
  constructor(private readonly jwtService: JwtService) {}

  issue(subject: string, kind: TokenKind, ttlSeconds: number): IssuedToken {
    const jti = randomUUID();
    const iat = Math.floor(Date.now() / 1000);
    const token = this.jwtService.sign(
      { kind, iat },
      { subject, jwtid: jti, expiresIn: ttlSeconds },
    );

    return { token, jti, expiresAt: new Date((iat + ttlSeconds) * 1000) };
  }

  verify(token: string, expectedKind: TokenKind): SessionTokenPayload {
    const payload = this.parse(token);

    if (payload.kind !== expectedKind) {
      throw new TokenVerificationError(
        'kind_mismatch',
        `Expected a ${expectedKind} token, got ${payload.kind}`,
      );
    }

    return payload;
  }

  private parse(token: string): SessionTokenPayload {
    let decoded: Record<string, unknown>;
    try {
      decoded = this.jwtService.verify<Record<string, unknown>>(token);
    } catch (error) {
      throw new TokenVerificationError(classify(error));
    }

    if (typeof decoded !== 'object' || decoded === null) {
      throw new TokenVerificationError('malformed', 'Token payload is not an object');
    }

    const { sub, kind, jti, exp, iat } = decoded;
    if (
      typeof sub !== 'string' ||
      sub === '' ||
      !isTokenKind(kind) ||
      typeof jti !== 'string' ||
      jti === '' ||
      typeof exp !== 'number'
    ) {
      throw new TokenVerificationError(
        'malformed',
        'Token payload is missing required claims',
      );
    }

    return {
      sub,
      kind,
      jti,
      exp,
      ...(typeof iat === 'number' ? { iat } : {}),
    };
  }
}

function classify(error: unknown): TokenFailureReason {
  if (error instanceof TokenExpiredError) {
    return 'expired';
  }
  if (error instanceof JsonWebTokenError && SIGNATURE_ERRORS.has(error.message)) {
    return 'invalid_signature';
  }
  return 'malformed';
}
