import { registerAs } from '@nestjs/config';
import { Algorithm } from 'jsonwebtoken';

export interface AuthConfig {
  jwtSecret: string;
  jwtAlgorithm: Algorithm;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  linkTokenMaxAgeSeconds: number;
  bcryptRounds: number;
}

const HMAC_ALGORITHMS: readonly Algorithm[] = ['HS256', 'HS384', 'HS512'];

const parsePositiveInt = (
  name: string,
  value: string | undefined,
  fallback: number,
): number => {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
};

const parseAlgorithm = (value: string | undefined): Algorithm => {
  const algorithm = HMAC_ALGORITHMS.find((a) => a === (value ?? 'HS256'));
  if (!algorithm) {
    throw new Error(
      `JWT_ALGORITHM must be one of ${HMAC_ALGORITHMS.join(', ')}, got "${value}"`,
    );
  }
  return algorithm;
};

export default registerAs('auth', (): AuthConfig => {
  const jwtSecret = process.env.JWT_SECRET;
  if (!jwtSecret) {
    throw new Error('JWT_SECRET is not defined');
  }

  return {
    jwtSecret,
    jwtAlgorithm: parseAlgorithm(process.env.JWT_ALGORITHM),
    accessTokenTtlSeconds:
      parsePositiveInt(
        'ACCESS_TOKEN_TTL_MINUTES',
        process.env.ACCESS_TOKEN_TTL_MINUTES,
        60,
      ) * 60,
    refreshTokenTtlSeconds:
      parsePositiveInt(
        'REFRESH_TOKEN_TTL_HOURS',
        process.env.REFRESH_TOKEN_TTL_HOURS,
        36,
      ) * 60 * 60,
    linkTokenMaxAgeSeconds: parsePositiveInt(
      'LINK_TOKEN_MAX_AGE_SECONDS',
      process.env.LINK_TOKEN_MAX_AGE_SECONDS,
      60 * 60,
    ),
    bcryptRounds: parsePositiveInt(
      'BCRYPT_ROUNDS',
      process.env.BCRYPT_ROUNDS,
      10,
    ),
  };
});
