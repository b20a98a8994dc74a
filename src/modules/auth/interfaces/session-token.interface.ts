import { TokenKind } from '../enums/token-kind.enum';

export interface SessionTokenPayload {
  sub: string;
  kind: TokenKind;
  jti: string;
  exp: number;
  iat?: number;
}

export interface IssuedToken {
  token: string;
  jti: string;
  expiresAt: Date;
}

export interface AuthTokens {
  access_token: string;
  refresh_token: string;
  token_type: 'bearer';
}

export interface RefreshedAccessToken {
  access_token: string;
  token_type: 'bearer';
}
