import { Logger, NotFoundException } from '@nestjs/common';
import { AuthMailListener } from './auth-mail.listener';
import { AuthService } from '../auth.service';
import { AccountMailEvent, AuthEvents, PasswordResetMailEvent } from '../events/auth.events';
import { LinkPurpose } from '../enums/link-purpose.enum';
import { LinkCodecService } from '../services/link-codec.service';
import { MailRecipient, MailService } from '../../mail/mail.service';
import {
  AuthTestContext,
  TEST_APP_URL,
  authTestingModule,
  createAuthTestContext,
} from '../../../../test/support/auth-testing.module';

const tokenOf = (link: string) => link.slice(link.lastIndexOf('/') + 1);

describe('AuthMailListener', () => {
  let context: AuthTestContext;
  let listener: AuthMailListener;
  let authService: AuthService;
  let linkCodec: LinkCodecService;
  let logError: jest.SpyInstance;
  let deliveries: Promise<void>[];

  const mail = {
    sendEmailVerification: jest.fn<Promise<void>, [MailRecipient, string]>(),
    sendPasswordReset: jest.fn<Promise<void>, [MailRecipient, string]>(),
  };

  const alice: AccountMailEvent = {
    uid: 'user-1',
    username: 'alice',
    email: 'alice@x.com',
  };

  beforeEach(async () => {
    mail.sendEmailVerification.mockReset().mockResolvedValue(undefined);
    mail.sendPasswordReset.mockReset().mockResolvedValue(undefined);
    logError = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

    context = createAuthTestContext();
    const moduleRef = await authTestingModule(context, {
      providers: [AuthMailListener, { provide: MailService, useValue: mail }],
    }).compile();
    listener = moduleRef.get(AuthMailListener);
    authService = moduleRef.get(AuthService);
    linkCodec = moduleRef.get(LinkCodecService);

    deliveries = [];
    const deliverVerification = (event: AccountMailEvent) => {
      deliveries.push(listener.handleVerificationRequested(event));
    };
    context.events.on(AuthEvents.USER_REGISTERED, deliverVerification);
    context.events.on(AuthEvents.VERIFICATION_REQUESTED, deliverVerification);
    context.events.on(AuthEvents.PASSWORD_RESET_REQUESTED, (event: PasswordResetMailEvent) => {
      deliveries.push(listener.handlePasswordResetRequested(event));
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('mails a verification link that decodes to the account address', async () => {
    await listener.handleVerificationRequested(alice);

    expect(mail.sendEmailVerification).toHaveBeenCalledTimes(1);
    const [recipient, link] = mail.sendEmailVerification.mock.calls[0];
    expect(recipient).toEqual(alice);
    expect(link.startsWith(`${TEST_APP_URL}/auth/verify-email/`)).toBe(true);
    expect(linkCodec.decode(LinkPurpose.EMAIL_VERIFICATION, tokenOf(link))).toEqual({
      email: 'alice@x.com',
      stamp: null,
    });
    expect(linkCodec.decode(LinkPurpose.PASSWORD_RESET, tokenOf(link))).toBeNull();
  });

  it('mails a reset link bound to the password stamp', async () => {
    await listener.handlePasswordResetRequested({ ...alice, passwordStamp: 'stamp-1' });

    const [, link] = mail.sendPasswordReset.mock.calls[0];
    expect(link.startsWith(`${TEST_APP_URL}/auth/password-reset/`)).toBe(true);
    expect(linkCodec.decode(LinkPurpose.PASSWORD_RESET, tokenOf(link))).toEqual({
      email: 'alice@x.com',
      stamp: 'stamp-1',
    });
  });

  it('logs a failed delivery instead of throwing', async () => {
    mail.sendPasswordReset.mockRejectedValueOnce(new Error('smtp down'));

    await expect(
      listener.handlePasswordResetRequested({ ...alice, passwordStamp: 'stamp-1' }),
    ).resolves.toBeUndefined();

    expect(logError).toHaveBeenCalledWith(
      'Failed to send password reset email for user user-1',
      expect.stringContaining('smtp down'),
    );
  });

  it('keeps a registered account unverified when its first mail fails', async () => {
    mail.sendEmailVerification.mockRejectedValueOnce(new Error('smtp down'));

    const registered = await authService.register({
      username: 'alice',
      email: 'alice@x.com',
      password: 'p4ssword1',
    });
    await Promise.all(deliveries);

    expect(context.users.all()).toHaveLength(1);
    expect(context.users.all()[0].isVerified).toBe(false);
    expect(logError).toHaveBeenCalledWith(
      `Failed to send verification email for user ${registered.uid}`,
      expect.stringContaining('smtp down'),
    );

    authService.requestEmailVerification(context.users.all()[0]);
    await Promise.all(deliveries);

    expect(mail.sendEmailVerification).toHaveBeenCalledTimes(2);
    const [, link] = mail.sendEmailVerification.mock.calls[1];
    await authService.verifyEmail(tokenOf(link));
    expect(context.users.all()[0].isVerified).toBe(true);
  });

  it('sends a reset link that works once', async () => {
    await authService.register({
      username: 'alice',
      email: 'alice@x.com',
      password: 'p4ssword1',
    });
    await authService.requestPasswordReset('alice@x.com');
    await Promise.all(deliveries);

    const [, link] = mail.sendPasswordReset.mock.calls[0];
    const newPassword = { password: 'n3wpassword', confirm_password: 'n3wpassword' };

    await authService.resetPassword(tokenOf(link), newPassword);
    await expect(authService.resetPassword(tokenOf(link), newPassword)).rejects.toThrow(
      NotFoundException,
    );
    await expect(authService.login('alice', 'n3wpassword')).resolves.toBeDefined();
  });
});
