import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import { Request } from 'express';
import { ExtractJwt } from 'passport-jwt';

const extractBearer = ExtractJwt.fromAuthHeaderAsBearerToken();

/** Raw bearer token of the current request, as the JWT strategy read it. */
export const BearerToken = createParamDecorator(
  (data: unknown, ctx: ExecutionContext): string => {
    const token = extractBearer(ctx.switchToHttp().getRequest<Request>());
    if (!token) {
      throw new UnauthorizedException();
    }
    return token;
  },
);
