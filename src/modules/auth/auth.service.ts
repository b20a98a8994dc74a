import {
  Injectable,
  Logger,
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { AuthConfig } from '../../config/auth.config';
import { UsersService } from '../users/users.service';
import { PublicUser, User, toPublicUser } from '../users/entities/user.entity';
import { TokenKind } from './enums/token-kind.enum';
import { LinkPurpose } from './enums/link-purpose.enum';
import { TokenVerificationError } from './errors/token-verification.error';
import {
  AccountMailEvent,
  AuthEvents,
  PasswordResetMailEvent,
} from './events/auth.events';
import {
  AuthTokens,
  RefreshedAccessToken,
  SessionTokenPayload,
} from './interfaces/session-token.interface';
import {
  passwordPolicyViolation,
  usernamePolicyViolation,
} from './policies/credential-policy';
import { LinkCodecService } from './services/link-codec.service';
import { PasswordHasherService } from './services/password-hasher.service';
import { RevocationRegistryService } from './services/revocation-registry.service';
import { TokenCodecService } from './services/token-codec.service';
import { RegisterDto } from './dto/register.dto';
import { ResetPasswordDto } from './dto/reset-password.dto';

const INVALID_CREDENTIALS = 'Incorrect username or password';
const INVALID_TOKEN =
  'Could not validate credentials: please provide a valid token';
const INVALID_LINK = 'Link is invalid, expired, or no longer matches an account';

/**
 * Session lifecycle: login, token issuance, renewal, logout and identity
 * resolution, plus the registration and e-mail link flows around them.
 *
 * A session token is issued, stays active until it expires or its jti lands
 * in the revocation registry, and is never extended. Refresh mints a new
 * access token and leaves both the renewal token and any earlier access token
 * untouched.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  private readonly accessTokenTtlSeconds: number;
  private readonly refreshTokenTtlSeconds: number;

  constructor(
    private readonly usersService: UsersService,
    private readonly passwordHasher: PasswordHasherService,
    private readonly tokenCodec: TokenCodecService,
    private readonly revocationRegistry: RevocationRegistryService,
    private readonly linkCodec: LinkCodecService,
    private readonly eventEmitter: EventEmitter2,
    configService: ConfigService,
  ) {
    const auth = configService.getOrThrow<AuthConfig>('auth');
    this.accessTokenTtlSeconds = auth.accessTokenTtlSeconds;
    this.refreshTokenTtlSeconds = auth.refreshTokenTtlSeconds;
  }

  async register(registerDto: RegisterDto): Promise<PublicUser> {
    const { username, email, password } = registerDto;

    if (await this.usersService.findByUsername(username)) {
      throw new ConflictException('Username already registered');
    }
    if (await this.usersService.findByEmail(email)) {
      throw new ConflictException('Email already registered');
    }

    const violation =
      usernamePolicyViolation(username) ?? passwordPolicyViolation(password);
    if (violation) {
      throw new ForbiddenException(violation);
    }

    const passwordHash = await this.passwordHasher.hash(password);
    const user = await this.usersService.create({
      username,
      email,
      passwordHash,
    });

    this.logger.log(`User ${user.username} registered`);
    // The account is committed; mail delivery happens in a listener and an
    // undelivered verification mail leaves it unverified, nothing more.
    this.eventEmitter.emit(AuthEvents.USER_REGISTERED, toMailEvent(user));

    return toPublicUser(user);
  }

  /** Same error, and the same hashing work, for an unknown user and a wrong password. */
  async authenticate(username: string, password: string): Promise<User> {
    const user = await this.usersService.findByUsername(username);
    if (!user) {
      await this.passwordHasher.verifyAgainstDecoy(password);
      throw new UnauthorizedException(INVALID_CREDENTIALS);
    }
    if (!(await this.passwordHasher.verify(password, user.passwordHash))) {
      throw new UnauthorizedException(INVALID_CREDENTIALS);
    }
    return user;
  }

  issueAccessToken(user: User): string {
    return this.tokenCodec.issue(
      user.uid,
      TokenKind.ACCESS,
      this.accessTokenTtlSeconds,
    ).token;
  }

  issueRenewalToken(user: User): string {
    return this.tokenCodec.issue(
      user.uid,
      TokenKind.RENEWAL,
      this.refreshTokenTtlSeconds,
    ).token;
  }

  async login(username: string, password: string): Promise<AuthTokens> {
    const user = await this.authenticate(username, password);
    this.logger.log(`User ${user.username} logged in`);
    return {
      access_token: this.issueAccessToken(user),
      refresh_token: this.issueRenewalToken(user),
      token_type: 'bearer',
    };
  }

  async resolveIdentity(token: string, expectedKind: TokenKind): Promise<User> {
    const payload = await this.verifyActive(token, expectedKind);

    const user = await this.usersService.findByUid(payload.sub);
    if (!user) {
      this.logger.debug(`Token ${payload.jti} refers to deleted account ${payload.sub}`);
      throw new UnauthorizedException(INVALID_TOKEN);
    }
    return user;
  }

  /** The renewal token is neither rotated nor revoked. */
  async refresh(renewalToken: string): Promise<RefreshedAccessToken> {
    const user = await this.resolveIdentity(renewalToken, TokenKind.RENEWAL);
    return {
      access_token: this.issueAccessToken(user),
      token_type: 'bearer',
    };
  }

  async logout(accessToken: string, renewalToken?: string): Promise<void> {
    const access = await this.verifyActive(accessToken, TokenKind.ACCESS);
    await this.revocationRegistry.revoke(access.jti, this.accessTokenTtlSeconds);

    if (renewalToken) {
      const renewal = this.tryVerify(renewalToken, TokenKind.RENEWAL);
      if (renewal && renewal.sub === access.sub) {
        await this.revocationRegistry.revoke(
          renewal.jti,
          this.refreshTokenTtlSeconds,
        );
      } else {
        this.logger.debug('Ignored renewal token on logout: not valid for this subject');
      }
    }

    this.logger.log(`Session ${access.jti} of ${access.sub} logged out`);
  }

  async verifyEmail(linkToken: string): Promise<void> {
    const { user } = await this.userFromLink(LinkPurpose.EMAIL_VERIFICATION, linkToken);
    await this.usersService.markVerified(user);
    this.logger.log(`User ${user.username} verified ${user.email}`);
  }

  requestEmailVerification(user: User): void {
    if (user.isVerified) {
      return;
    }
    this.eventEmitter.emit(AuthEvents.VERIFICATION_REQUESTED, toMailEvent(user));
  }

  /** Answers the same whether or not the address belongs to an account. */
  async requestPasswordReset(email: string): Promise<void> {
    const user = await this.usersService.findByEmail(email);
    if (!user) {
      this.logger.debug('Password reset requested for an unknown address');
      return;
    }
    const event: PasswordResetMailEvent = {
      ...toMailEvent(user),
      passwordStamp: this.linkCodec.passwordStamp(user.passwordHash),
    };
    this.eventEmitter.emit(AuthEvents.PASSWORD_RESET_REQUESTED, event);
  }

  /** A reset link is bound to the password it replaces, so it works once. */
  async resetPassword(linkToken: string, resetDto: ResetPasswordDto): Promise<void> {
    const { user, stamp } = await this.userFromLink(LinkPurpose.PASSWORD_RESET, linkToken);
    if (stamp !== this.linkCodec.passwordStamp(user.passwordHash)) {
      this.logger.debug(`Rejected reset link issued for an earlier password of ${user.uid}`);
      throw new NotFoundException(INVALID_LINK);
    }

    if (resetDto.password !== resetDto.confirm_password) {
      throw new BadRequestException('Passwords do not match');
    }
    const violation = passwordPolicyViolation(resetDto.password);
    if (violation) {
      throw new ForbiddenException(violation);
    }

    const passwordHash = await this.passwordHasher.hash(resetDto.password);
    await this.usersService.updatePasswordHash(user, passwordHash);
    this.logger.log(`User ${user.username} reset their password`);
  }

  private async verifyActive(
    token: string,
    expectedKind: TokenKind,
  ): Promise<SessionTokenPayload> {
    let payload: SessionTokenPayload;
    try {
      payload = this.tokenCodec.verify(token, expectedKind);
    } catch (error) {
      if (error instanceof TokenVerificationError) {
        this.logger.debug(`Rejected ${expectedKind} token: ${error.reason}`);
        throw new UnauthorizedException(INVALID_TOKEN);
      }
      throw error;
    }

    if (await this.revocationRegistry.isRevoked(payload.jti)) {
      this.logger.debug(`Rejected revoked ${expectedKind} token ${payload.jti}`);
      throw new UnauthorizedException(INVALID_TOKEN);
    }
    return payload;
  }

  private tryVerify(token: string, kind: TokenKind): SessionTokenPayload | null {
    try {
      return this.tokenCodec.verify(token, kind);
    } catch (error) {
      if (error instanceof TokenVerificationError) {
        return null;
      }
      throw error;
    }
  }

  private async userFromLink(
    purpose: LinkPurpose,
    linkToken: string,
  ): Promise<{ user: User; stamp: string | null }> {
    const claims = this.linkCodec.decode(purpose, linkToken);
    const user = claims ? await this.usersService.findByEmail(claims.email) : null;
    if (!claims || !user) {
      throw new NotFoundException(INVALID_LINK);
    }
    return { user, stamp: claims.stamp };
  }
}

function toMailEvent(user: User): AccountMailEvent {
  return { uid: user.uid, username: user.username, email: user.email };
}
