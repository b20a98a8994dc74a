import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { createHmac } from 'crypto';
import { AuthConfig } from '../../../config/auth.config';
import { LinkPurpose } from '../enums/link-purpose.enum';

export interface LinkClaims {
  email: string;
  /** Password stamp the link was bound to, if any. */
  stamp: string | null;
}

const deriveSecret = (signingKey: string, purpose: LinkPurpose): string =>
  createHmac('sha256', signingKey).update(purpose).digest('hex');

/**
 * Signed tokens for e-mail verification and password reset links.
 *
 * Every purpose is signed with a key derived from the session signing key,
 * so a link token never verifies as a session token, nor as a link of the
 * other purpose. Link tokens carry no expiry claim: freshness is judged from
 * `iat` against a max age when decoding.
 */
@Injectable()
export class LinkCodecService {
  private readonly logger = new Logger(LinkCodecService.name);
  private readonly secrets: Record<LinkPurpose, string>;
  private readonly defaultMaxAgeSeconds: number;

  constructor(
    private readonly jwtService: JwtService,
    configService: ConfigService,
  ) {
    const auth = configService.getOrThrow<AuthConfig>('auth');
    this.secrets = {
      [LinkPurpose.EMAIL_VERIFICATION]: deriveSecret(
        auth.jwtSecret,
        LinkPurpose.EMAIL_VERIFICATION,
      ),
      [LinkPurpose.PASSWORD_RESET]: deriveSecret(
        auth.jwtSecret,
        LinkPurpose.PASSWORD_RESET,
      ),
    };
    this.defaultMaxAgeSeconds = auth.linkTokenMaxAgeSeconds;
  }

  encode(purpose: LinkPurpose, email: string, stamp?: string): string {
    return this.jwtService.sign(stamp ? { email, stamp } : { email }, {
      secret: this.secrets[purpose],
    });
  }

  /** Null for a tampered, malformed or stale token, or one minted for another purpose. */
  decode(
    purpose: LinkPurpose,
    token: string,
    maxAgeSeconds = this.defaultMaxAgeSeconds,
  ): LinkClaims | null {
    let decoded: Record<string, unknown>;
    try {
      decoded = this.jwtService.verify<Record<string, unknown>>(token, {
        secret: this.secrets[purpose],
        maxAge: maxAgeSeconds,
      });
    } catch (error) {
      this.logger.debug(
        `Rejected ${purpose} link: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }

    const { email, stamp } = decoded;
    if (typeof email !== 'string' || email === '') {
      return null;
    }
    return { email, stamp: typeof stamp === 'string' ? stamp : null };
  }

  /**
   * Short keyed fingerprint of a password digest. It changes with every new
   * digest, which makes a reset link bound to it single-use.
   */
  passwordStamp(passwordHash: string): string {
    return createHmac('sha256', this.secrets[LinkPurpose.PASSWORD_RESET])
      .update(passwordHash)
      .digest('base64url')
      .slice(0, 16);
  }
}
