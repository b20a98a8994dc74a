import { registerAs } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import { User } from '../modules/users/entities/user.entity';
import { Todo } from '../modules/todos/entities/todo.entity';

const isTrue = (value: string | undefined) => value?.trim().toLowerCase() === 'true';

/** Connection settings shared by the application and the TypeORM CLI. */
export function postgresOptions(
  env: NodeJS.ProcessEnv = process.env,
): PostgresConnectionOptions {
  const useSsl = isTrue(env.DATABASE_SSL) || env.NODE_ENV === 'production';
  return {
    type: 'postgres',
    url: env.DATABASE_URL,
    entities: [User, Todo],
    migrations: [__dirname + '/../migrations/*{.ts,.js}'],
    logging: isTrue(env.DATABASE_LOGGING),
    ssl: useSsl
      ? { rejectUnauthorized: isTrue(env.DATABASE_SSL_REJECT_UNAUTHORIZED) }
      : false,
  };
}

export default registerAs(
  'database',
  (): TypeOrmModuleOptions => ({
    ...postgresOptions(),
    // migrations own the schema in production
    synchronize: process.env.NODE_ENV !== 'production',
  }),
);
