export enum TokenKind {
  ACCESS = 'access',
  RENEWAL = 'renewal',
}

export function isTokenKind(value: unknown): value is TokenKind {
  return value === TokenKind.ACCESS || value === TokenKind.RENEWAL;
}
