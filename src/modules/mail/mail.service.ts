import { Injectable, Logger } from '@nestjs/common';
import { ISendMailOptions, MailerService } from '@nestjs-modules/mailer';
import { ConfigService } from '@nestjs/config';

export interface MailRecipient {
  username: string;
  email: string;
}

@Injectable()
export class MailService {
  private readonly logger = new Logger(MailService.name);
  private readonly brandName: string;

  constructor(
    private readonly mailerService: MailerService,
    private readonly configService: ConfigService,
  ) {
    this.brandName =
      this.configService.get<string>('MAIL_BRAND_NAME') || 'Todos';
  }

  async sendEmailVerification(recipient: MailRecipient, link: string) {
    await this.send(
      {
        to: recipient.email,
        subject: `Confirm your e-mail address - ${this.brandName}`,
        template: 'verify-email',
        context: {
          brandName: this.brandName,
          username: recipient.username,
          link,
        },
      },
      'verification',
    );
  }

  async sendPasswordReset(recipient: MailRecipient, link: string) {
    await this.send(
      {
        to: recipient.email,
        subject: `Reset your password - ${this.brandName}`,
        template: 'reset-password',
        context: {
          brandName: this.brandName,
          username: recipient.username,
          link,
        },
      },
      'password reset',
    );
  }

  private async send(mailOptions: ISendMailOptions, kind: string) {
    const bccAddress = this.configService.get<string>('MAIL_BCC_ADDRESS');
    if (bccAddress) {
      mailOptions.bcc = bccAddress;
    }

    try {
      await this.mailerService.sendMail(mailOptions);
      this.logger.log(`${kind} email sent to ${String(mailOptions.to)}`);
    } catch (error) {
      this.logger.error(
        `Failed to send ${kind} email to ${String(mailOptions.to)}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
  }
}
