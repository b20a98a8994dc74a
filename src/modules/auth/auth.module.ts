import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { AuthConfig } from '../../config/auth.config';
import { UsersModule } from '../users/users.module';
import { MailModule } from '../mail/mail.module';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { JwtStrategy } from './strategies/jwt.strategy';
import { PasswordHasherService } from './services/password-hasher.service';
import { TokenCodecService } from './services/token-codec.service';
import { RevocationRegistryService } from './services/revocation-registry.service';
import { LinkCodecService } from './services/link-codec.service';
import { AuthMailListener } from './listeners/auth-mail.listener';

@Module({
  imports: [
    UsersModule,
    MailModule,
    PassportModule,
    JwtModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const auth = configService.getOrThrow<AuthConfig>('auth');
        return {
          secret: auth.jwtSecret,
          signOptions: { algorithm: auth.jwtAlgorithm },
          verifyOptions: { algorithms: [auth.jwtAlgorithm] },
        };
      },
    }),
  ],
  controllers: [AuthController],
  providers: [
    AuthService,
    JwtStrategy,
    PasswordHasherService,
    TokenCodecService,
    RevocationRegistryService,
    LinkCodecService,
    AuthMailListener,
  ],
  exports: [AuthService],
})
export class AuthModule {}
