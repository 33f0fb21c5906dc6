import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitBookClub1760000000000 implements MigrationInterface {
    name = 'InitBookClub1760000000000';

    public async up(queryRunner: QueryRunner): Promise<void> {
      await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS "member" (
                "id" SERIAL PRIMARY KEY,
                "name" text NOT NULL,
                "preferred_length" integer NOT NULL DEFAULT 300,
                "liked_genres" text NOT NULL,
                "created_at" TIMESTAMP NOT NULL DEFAULT now()
            )
        `);

      await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS "book" (
                "id" SERIAL PRIMARY KEY,
                "title" text NOT NULL,
                "author" text NOT NULL,
                "genre" text NOT NULL,
                "page_count" integer NOT NULL,
                "suggested_by" integer REFERENCES "member" ("id") ON DELETE SET NULL
            )
        `);

      await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS "reading_history" (
                "id" SERIAL PRIMARY KEY,
                "book_id" integer NOT NULL REFERENCES "book" ("id"),
                "read_date" TIMESTAMP NOT NULL DEFAULT now(),
                "round_number" integer NOT NULL
            )
        `);

      await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS "veto" (
                "id" SERIAL PRIMARY KEY,
                "member_id" integer NOT NULL REFERENCES "member" ("id"),
                "genre" text NOT NULL,
                "round_number" integer NOT NULL
            )
        `);

      await queryRunner.query('CREATE INDEX IF NOT EXISTS "idx_book_genre" ON "book" ("genre")');
      await queryRunner.query('CREATE INDEX IF NOT EXISTS "idx_reading_history_round" ON "reading_history" ("round_number")');
      await queryRunner.query('CREATE INDEX IF NOT EXISTS "idx_veto_member_round" ON "veto" ("member_id", "round_number")');
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
      // Reverse order for the foreign keys
      await queryRunner.query('DROP TABLE IF EXISTS "veto"');
      await queryRunner.query('DROP TABLE IF EXISTS "reading_history"');
      await queryRunner.query('DROP TABLE IF EXISTS "book"');
      await queryRunner.query('DROP TABLE IF EXISTS "member"');
    }
}
