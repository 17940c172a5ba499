/**
 * Schema bootstrap. Every statement is idempotent so it runs on each start.
 */
export const MIGRATION_SQL = `
CREATE TABLE IF NOT EXISTS "users" (
  "id" text PRIMARY KEY NOT NULL,
  "name" text NOT NULL,
  "access_code" text NOT NULL,
  "created_at" text DEFAULT (datetime('now')) NOT NULL,
  "updated_at" text DEFAULT (datetime('now')) NOT NULL,
  CONSTRAINT "users_name_unique" UNIQUE("name")
);

CREATE TABLE IF NOT EXISTS "templates" (
  "id" text PRIMARY KEY NOT NULL,
  "name" text NOT NULL,
  "description" text,
  "version" integer DEFAULT 1 NOT NULL,
  "parent_id" text,
  "status" text DEFAULT 'draft' NOT NULL,
  "base_image" text NOT NULL,
  "stack" text NOT NULL,
  "default_quota" text DEFAULT '{}' NOT NULL,
  "ports" text DEFAULT '[]' NOT NULL,
  "env_vars" text DEFAULT '{}' NOT NULL,
  "git_repository_url" text,
  "git_branch" text,
  "image_tag" text,
  "created_at" text DEFAULT (datetime('now')) NOT NULL,
  "updated_at" text DEFAULT (datetime('now')) NOT NULL,
  CONSTRAINT "templates_name_version_unique" UNIQUE("name", "version")
);

CREATE TABLE IF NOT EXISTS "environments" (
  "id" text PRIMARY KEY NOT NULL,
  "user_id" text NOT NULL REFERENCES "users"("id"),
  "template_id" text NOT NULL REFERENCES "templates"("id"),
  "name" text NOT NULL,
  "namespace" text NOT NULL,
  "status" text DEFAULT 'pending' NOT NULL,
  "status_message" text,
  "git_repository_url" text,
  "git_branch" text,
  "quota" text NOT NULL,
  "ports" text DEFAULT '[]' NOT NULL,
  "env_vars" text DEFAULT '{}' NOT NULL,
  "image" text NOT NULL,
  "access_url" text,
  "resources" text DEFAULT '[]' NOT NULL,
  "expires_at" text NOT NULL,
  "provisioning_started_at" text,
  "created_at" text DEFAULT (datetime('now')) NOT NULL,
  "updated_at" text DEFAULT (datetime('now')) NOT NULL,
  "deleted_at" text
);

CREATE INDEX IF NOT EXISTS "environments_namespace_idx" ON "environments" ("namespace");
CREATE INDEX IF NOT EXISTS "environments_status_expires_idx" ON "environments" ("status", "expires_at");
CREATE INDEX IF NOT EXISTS "environments_template_idx" ON "environments" ("template_id");
`;
