import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitialSchema1730000000001 implements MigrationInterface {
  name = 'InitialSchema1730000000001';

  public async up(queryRunner: QueryRunner): Promise<void> {
    // gen_random_uuid() is built in from PostgreSQL 13; older servers take it from pgcrypto
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "pgcrypto"`);

    await queryRunner.query(`
      CREATE TABLE "bot_users" (
        "id" bigint NOT NULL,
        "username" character varying(64),
        "first_name" character varying(128),
        "last_name" character varying(128),
        "is_active" boolean NOT NULL DEFAULT true,
        "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_bot_users" PRIMARY KEY ("id")
      )
    `);

    // No uniqueness on (user_id, phone_number): every submission gets its own row
    await queryRunner.query(`
      CREATE TABLE "phone_numbers" (
        "id" SERIAL NOT NULL,
        "user_id" bigint NOT NULL,
        "phone_number" character varying(32) NOT NULL,
        "is_authenticated" boolean NOT NULL DEFAULT false,
        "status" character varying(16) NOT NULL DEFAULT 'pending',
        "added_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        "last_login_at" TIMESTAMP WITH TIME ZONE,
        CONSTRAINT "PK_phone_numbers" PRIMARY KEY ("id"),
        CONSTRAINT "FK_phone_numbers_user_id" FOREIGN KEY ("user_id")
          REFERENCES "bot_users"("id") ON DELETE CASCADE
      )
    `);

    await queryRunner.query(`
      CREATE INDEX "idx_phone_numbers_user_id" ON "phone_numbers" ("user_id")
    `);

    await queryRunner.query(`
      CREATE TABLE "account_sessions" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "user_id" bigint NOT NULL,
        "phone_number" character varying(32) NOT NULL,
        "session_ref" text NOT NULL,
        "is_active" boolean NOT NULL DEFAULT true,
        "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_account_sessions" PRIMARY KEY ("id"),
        CONSTRAINT "FK_account_sessions_user_id" FOREIGN KEY ("user_id")
          REFERENCES "bot_users"("id") ON DELETE CASCADE
      )
    `);

    await queryRunner.query(`
      CREATE UNIQUE INDEX "uq_account_sessions_user_phone"
      ON "account_sessions" ("user_id", "phone_number")
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX "uq_account_sessions_user_phone"`);
    await queryRunner.query(`DROP TABLE "account_sessions"`);
    await queryRunner.query(`DROP INDEX "idx_phone_numbers_user_id"`);
    await queryRunner.query(`DROP TABLE "phone_numbers"`);
    await queryRunner.query(`DROP TABLE "bot_users"`);
  }
}
