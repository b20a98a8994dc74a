import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OnEvent } from '@nestjs/event-emitter';
import { MailService } from '../../mail/mail.service';
import { LinkCodecService } from '../services/link-codec.service';
import { LinkPurpose } from '../enums/link-purpose.enum';
import {
  AccountMailEvent,
  AuthEvents,
  PasswordResetMailEvent,
} from '../events/auth.events';

@Injectable()
export class AuthMailListener {
  private readonly logger = new Logger(AuthMailListener.name);
  private readonly appUrl: string;

  constructor(
    private readonly mailService: MailService,
    private readonly linkCodec: LinkCodecService,
    configService: ConfigService,
  ) {
    this.appUrl = (
      configService.get<string>('APP_URL') || 'http://localhost:3000/api/v1'
    ).replace(/\/+$/, '');
  }

  @OnEvent(AuthEvents.USER_REGISTERED)
  @OnEvent(AuthEvents.VERIFICATION_REQUESTED)
  async handleVerificationRequested(event: AccountMailEvent) {
    try {
      const token = this.linkCodec.encode(LinkPurpose.EMAIL_VERIFICATION, event.email);
      await this.mailService.sendEmailVerification(
        event,
        `${this.appUrl}/auth/verify-email/${token}`,
      );
    } catch (error) {
      // The account stays unverified and the user can ask for another link
      this.logger.error(
        `Failed to send verification email for user ${event.uid}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  @OnEvent(AuthEvents.PASSWORD_RESET_REQUESTED)
  async handlePasswordResetRequested(event: PasswordResetMailEvent) {
    try {
      const token = this.linkCodec.encode(
        LinkPurpose.PASSWORD_RESET,
        event.email,
        event.passwordStamp,
      );
      await this.mailService.sendPasswordReset(
        event,
        `${this.appUrl}/auth/password-reset/${token}`,
      );
    } catch (error) {
      this.logger.error(
        `Failed to send password reset email for user ${event.uid}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }
}
