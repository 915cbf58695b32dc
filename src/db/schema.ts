/**
 * PostgreSQL schema for the postgres storage backend
 */

export const SCHEMA = `
-- ═══════════════════════════════════════════════════════════════════════════════
-- Stored Objects Table
-- Same key layout as the S3 bucket: processed/, boletines/, logs/
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS stored_objects (
  key TEXT PRIMARY KEY,
  body BYTEA NOT NULL,
  content_type TEXT NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE INDEX IF NOT EXISTS idx_stored_objects_created_at ON stored_objects(created_at DESC);
`;
