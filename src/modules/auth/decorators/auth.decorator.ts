import { applyDecorators, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { ApiBearerAuth, ApiUnauthorizedResponse } from '@nestjs/swagger';
import { UserRole } from '../../users/enums/user-role.enum';
import { Roles } from './roles.decorator';
import { RolesGuard } from '../guards/roles.guard';

export const JWT_STRATEGY = 'jwt';

/**
 * Requires a valid, unrevoked access token and, when roles are given, one of
 * those roles.
 *
 * @example
 * // Any signed-in user
 * @Auth()
 *
 * // Admins only
 * @Auth(UserRole.ADMIN)
 */
export function Auth(...roles: UserRole[]): ReturnType<typeof applyDecorators> {
  const documented = [
    ApiBearerAuth('JWT-auth'),
    ApiUnauthorizedResponse({ description: 'Missing, invalid, expired or revoked token' }),
  ];

  if (roles.length === 0) {
    return applyDecorators(UseGuards(AuthGuard(JWT_STRATEGY)), ...documented);
  }

  return applyDecorators(
    Roles(...roles),
    UseGuards(AuthGuard(JWT_STRATEGY), RolesGuard),
    ...documented,
  );
}
