import { Module, Logger } from '@nestjs/common';
import { MailerModule } from '@nestjs-modules/mailer';
import { HandlebarsAdapter } from '@nestjs-modules/mailer/dist/adapters/handlebars.adapter';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { join } from 'path';
import { MailService } from './mail.service';

@Module({
  imports: [
    MailerModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => {
        const logger = new Logger('MailModule');
        const host = configService.get<string>('MAIL_HOST') || 'localhost';
        const port = Number(configService.get<string>('MAIL_PORT') || 587);
        const user = configService.get<string>('MAIL_USER');
        const pass = configService.get<string>('MAIL_PASSWORD');

        const brandName =
          configService.get<string>('MAIL_BRAND_NAME') || 'Todos';
        const mailFrom =
          configService.get<string>('MAIL_FROM') ||
          `"${brandName}" <no-reply@localhost>`;

        logger.log(`SMTP transport ${host}:${port}, from ${mailFrom}`);

        return {
          transport: {
            host,
            port,
            // Implicit TLS on 465, STARTTLS elsewhere
            secure: port === 465,
            ...(user ? { auth: { user, pass } } : {}),
          },
          defaults: {
            from: mailFrom,
          },
          template: {
            dir: join(process.cwd(), 'templates', 'mail'),
            adapter: new HandlebarsAdapter({
              year: () => new Date().getFullYear(),
            }),
            options: {
              strict: true,
            },
          },
        };
      },
      inject: [ConfigService],
    }),
  ],
  providers: [MailService],
  exports: [MailService],
})
export class MailModule {}
