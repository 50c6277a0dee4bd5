/** SQL schema for the preferences table. */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS preferences (
  key         TEXT PRIMARY KEY,
  value       TEXT NOT NULL,        -- JSON array of strings
  updated_at  TEXT NOT NULL DEFAULT (datetime('now'))
);
`;
