const TABLE_NAME_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/** dbmate migration creating the table read by `PgCheckpointStore`. */
export function generateCheckpointMigration(tableName: string): string {
  if (!TABLE_NAME_REGEX.test(tableName)) {
    throw new Error(
      `Invalid table name "${tableName}". Only alphanumeric characters and underscores are allowed.`,
    );
  }

  return `-- migrate:up
CREATE TABLE ${tableName} (
    pid TEXT NOT NULL,
    tag TEXT NOT NULL DEFAULT '',
    type_id TEXT NOT NULL,
    label TEXT NOT NULL,
    bundle JSONB NOT NULL,
    saved_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (pid, tag)
);

CREATE INDEX idx_${tableName}_label
    ON ${tableName} (label);

CREATE INDEX idx_${tableName}_saved_at
    ON ${tableName} (saved_at);

-- migrate:down
DROP TABLE IF EXISTS ${tableName};
`;
}
