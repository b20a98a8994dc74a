import { Provider } from '@nestjs/common';
import { Test, TestingModuleBuilder } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { getRepositoryToken } from '@nestjs/typeorm';
import { AuthConfig } from '../../src/config/auth.config';
import { REDIS_CLIENT } from '../../src/common/redis/redis.constants';
import { User } from '../../src/modules/users/entities/user.entity';
import { UsersService } from '../../src/modules/users/users.service';
import { UsersController } from '../../src/modules/users/users.controller';
import { Todo } from '../../src/modules/todos/entities/todo.entity';
import { TodosService } from '../../src/modules/todos/todos.service';
import { TodosController } from '../../src/modules/todos/todos.controller';
import { AuthService } from '../../src/modules/auth/auth.service';
import { AuthController } from '../../src/modules/auth/auth.controller';
import { JwtStrategy } from '../../src/modules/auth/strategies/jwt.strategy';
import { PasswordHasherService } from '../../src/modules/auth/services/password-hasher.service';
import { TokenCodecService } from '../../src/modules/auth/services/token-codec.service';
import { RevocationRegistryService } from '../../src/modules/auth/services/revocation-registry.service';
import { LinkCodecService } from '../../src/modules/auth/services/link-codec.service';
import { InMemoryRepository } from './in-memory.repository';
import { FakeRedis } from './fake-redis';

export const TEST_AUTH_CONFIG: AuthConfig = {
  jwtSecret: 'test-secret',
  jwtAlgorithm: 'HS256',
  accessTokenTtlSeconds: 60 * 60,
  refreshTokenTtlSeconds: 36 * 60 * 60,
  linkTokenMaxAgeSeconds: 60 * 60,
  bcryptRounds: 4,
};

export const TEST_APP_URL = 'http://todos.test/api/v1';

export const testConfigService = (): ConfigService =>
  new ConfigService({ auth: TEST_AUTH_CONFIG, APP_URL: TEST_APP_URL });

export const testJwtModule = () =>
  JwtModule.register({
    secret: TEST_AUTH_CONFIG.jwtSecret,
    signOptions: { algorithm: TEST_AUTH_CONFIG.jwtAlgorithm },
    verifyOptions: { algorithms: [TEST_AUTH_CONFIG.jwtAlgorithm] },
  });

export interface AuthTestContext {
  users: InMemoryRepository<User>;
  todos: InMemoryRepository<Todo>;
  redis: FakeRedis;
  events: EventEmitter2;
}

export function createAuthTestContext(): AuthTestContext {
  return {
    users: new InMemoryRepository(() => new User()),
    todos: new InMemoryRepository(() => new Todo()),
    redis: new FakeRedis(),
    events: new EventEmitter2(),
  };
}

/**
 * The auth, users and todos providers wired to in-memory stand-ins for
 * PostgreSQL and Redis. Mail listeners are left out unless passed in
 * `providers`.
 */
export function authTestingModule(
  context: AuthTestContext,
  options: { withControllers?: boolean; providers?: Provider[] } = {},
): TestingModuleBuilder {
  return Test.createTestingModule({
    imports: [PassportModule, testJwtModule()],
    controllers: options.withControllers
      ? [AuthController, UsersController, TodosController]
      : [],
    providers: [
      AuthService,
      UsersService,
      TodosService,
      JwtStrategy,
      PasswordHasherService,
      TokenCodecService,
      RevocationRegistryService,
      LinkCodecService,
      { provide: ConfigService, useValue: testConfigService() },
      { provide: EventEmitter2, useValue: context.events },
      { provide: REDIS_CLIENT, useValue: context.redis },
      { provide: getRepositoryToken(User), useValue: context.users },
      { provide: getRepositoryToken(Todo), useValue: context.todos },
      ...(options.providers ?? []),
    ],
  });
}
