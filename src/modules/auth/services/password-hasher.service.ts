import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import { randomUUID } from 'crypto';
import { AuthConfig } from '../../../config/auth.config';

@Injectable()
export class PasswordHasherService {
  private readonly logger = new Logger(PasswordHasherService.name);
  private readonly rounds: number;
  private decoyDigest: Promise<string> | null = null;

  constructor(configService: ConfigService) {
    this.rounds = configService.getOrThrow<AuthConfig>('auth').bcryptRounds;
  }

  hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.rounds);
  }

  /**
   * A digest bcrypt cannot parse is logged and treated as a mismatch;
   * callers only need to know whether the password was accepted.
   */
  async verify(password: string, digest: string): Promise<boolean> {
    try {
      return await bcrypt.compare(password, digest);
    } catch (error) {
      this.logger.warn(
        `Stored password digest could not be checked: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  /** Spends the work of a real comparison when there is no digest to compare with. */
  async verifyAgainstDecoy(password: string): Promise<false> {
    if (!this.decoyDigest) {
      this.decoyDigest = this.hash(randomUUID());
    }
    await this.verify(password, await this.decoyDigest);
    return false;
  }
}
