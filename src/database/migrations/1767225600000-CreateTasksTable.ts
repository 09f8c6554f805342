import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateTasksTable1767225600000 implements MigrationInterface {
  name = 'CreateTasksTable1767225600000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "tasks" (
        "id" text COLLATE "C" NOT NULL,
        "project_id" text NOT NULL,
        "title" text NOT NULL,
        "description" text,
        "status" text NOT NULL,
        "priority" text NOT NULL,
        "assignee_id" text,
        "due_date" date,
        "sort_order" integer NOT NULL DEFAULT 0,
        "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "pk_tasks" PRIMARY KEY ("id")
      )
    `);
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "idx_tasks_project_created_id" ON "tasks" ("project_id", "created_at", "id")`,
    );
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "idx_tasks_project_due_date" ON "tasks" ("project_id", "due_date")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX IF EXISTS "idx_tasks_project_due_date"`);
    await queryRunner.query(`DROP INDEX IF EXISTS "idx_tasks_project_created_id"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "tasks"`);
  }
}
