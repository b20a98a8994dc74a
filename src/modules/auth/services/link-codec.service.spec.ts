import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { LinkCodecService } from './link-codec.service';
import { TokenCodecService } from './token-codec.service';
import { TokenKind } from '../enums/token-kind.enum';
import { LinkPurpose } from '../enums/link-purpose.enum';
import { TokenVerificationError } from '../errors/token-verification.error';

const NOW_SECONDS = 1_700_000_000;

describe('LinkCodecService', () => {
  const jwtService = new JwtService({
    secret: 'test-secret',
    signOptions: { algorithm: 'HS256' },
    verifyOptions: { algorithms: ['HS256'] },
  });
  const configService = new ConfigService({
    auth: { jwtSecret: 'test-secret', linkTokenMaxAgeSeconds: 3600 },
  });
  const links = new LinkCodecService(jwtService, configService);
  const sessions = new TokenCodecService(jwtService);

  const setNow = (seconds: number) =>
    jest.spyOn(Date, 'now').mockReturnValue(seconds * 1000);

  beforeEach(() => {
    setNow(NOW_SECONDS);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const VERIFY = LinkPurpose.EMAIL_VERIFICATION;
  const RESET = LinkPurpose.PASSWORD_RESET;

  it('decodes what it encoded', () => {
    expect(links.decode(VERIFY, links.encode(VERIFY, 'alice@x.com'))).toEqual({
      email: 'alice@x.com',
      stamp: null,
    });
    expect(links.decode(RESET, links.encode(RESET, 'alice@x.com', 'stamp-1'))).toEqual({
      email: 'alice@x.com',
      stamp: 'stamp-1',
    });
  });

  it('keeps verification and reset links apart', () => {
    const verification = links.encode(VERIFY, 'alice@x.com');
    const reset = links.encode(RESET, 'alice@x.com', 'stamp-1');

    expect(links.decode(RESET, verification)).toBeNull();
    expect(links.decode(VERIFY, reset)).toBeNull();
  });

  it('honours the default max age', () => {
    const token = links.encode(VERIFY, 'alice@x.com');

    setNow(NOW_SECONDS + 3599);
    expect(links.decode(VERIFY, token)?.email).toBe('alice@x.com');

    setNow(NOW_SECONDS + 3601);
    expect(links.decode(VERIFY, token)).toBeNull();
  });

  it('takes a per-call max age', () => {
    const token = links.encode(VERIFY, 'alice@x.com');
    setNow(NOW_SECONDS + 120);

    expect(links.decode(VERIFY, token, 60)).toBeNull();
    expect(links.decode(VERIFY, token, 600)?.email).toBe('alice@x.com');
  });

  it('returns null for tampered or malformed tokens', () => {
    const token = links.encode(VERIFY, 'alice@x.com');

    expect(links.decode(VERIFY, `${token}x`)).toBeNull();
    expect(links.decode(VERIFY, 'garbage')).toBeNull();
  });

  it('does not interchange with session tokens', () => {
    const session = sessions.issue('user-1', TokenKind.ACCESS, 3600).token;
    const link = links.encode(VERIFY, 'alice@x.com');

    expect(links.decode(VERIFY, session)).toBeNull();
    expect(() => sessions.verify(link, TokenKind.ACCESS)).toThrow(TokenVerificationError);
  });

  it('stamps each password digest differently and repeatably', () => {
    const stamp = links.passwordStamp('$2b$04$first-digest');

    expect(stamp).toHaveLength(16);
    expect(links.passwordStamp('$2b$04$first-digest')).toBe(stamp);
    expect(links.passwordStamp('$2b$04$second-digest')).not.toBe(stamp);
  });
});
