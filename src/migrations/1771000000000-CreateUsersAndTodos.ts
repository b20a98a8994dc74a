import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateUsersAndTodos1771000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp";`);

    await queryRunner.query(`
      DO $$ BEGIN
        CREATE TYPE "users_role_enum" AS ENUM ('user', 'admin');
      EXCEPTION
        WHEN duplicate_object THEN null;
      END $$;
    `);

    await queryRunner.query(`
      CREATE TABLE "users" (
        "uid" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "username" character varying NOT NULL,
        "email" character varying NOT NULL,
        "password_hash" character varying NOT NULL,
        "is_verified" boolean NOT NULL DEFAULT false,
        "role" "users_role_enum" NOT NULL DEFAULT 'user',
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        "updated_at" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "UQ_users_username" UNIQUE ("username"),
        CONSTRAINT "UQ_users_email" UNIQUE ("email"),
        CONSTRAINT "PK_users_uid" PRIMARY KEY ("uid")
      );
    `);

    await queryRunner.query(`
      CREATE TABLE "todos" (
        "uid" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "title" character varying NOT NULL,
        "description" text,
        "completed" boolean NOT NULL DEFAULT false,
        "owner_id" uuid NOT NULL,
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        "updated_at" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_todos_uid" PRIMARY KEY ("uid"),
        CONSTRAINT "FK_todos_owner" FOREIGN KEY ("owner_id")
          REFERENCES "users"("uid") ON DELETE CASCADE
      );
    `);

    await queryRunner.query(`CREATE INDEX "IDX_todos_title" ON "todos" ("title");`);
    await queryRunner.query(`CREATE INDEX "IDX_todos_owner_id" ON "todos" ("owner_id");`);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "todos";`);
    await queryRunner.query(`DROP TABLE IF EXISTS "users";`);
    await queryRunner.query(`DROP TYPE IF EXISTS "users_role_enum";`);
  }
}
