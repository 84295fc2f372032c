import type Database from 'better-sqlite3';

export function initTaskSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS tasks (
      id TEXT PRIMARY KEY,
      status TEXT NOT NULL DEFAULT 'pending'
        CHECK (status IN ('pending', 'in_progress', 'completed', 'failed')),
      result INTEGER,
      error_message TEXT,
      last_error TEXT,
      attempt_count INTEGER NOT NULL DEFAULT 0,
      progress REAL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      completed_at TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_tasks_status_created_at ON tasks(status, created_at);
  `);
}

export function initBrokerSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS queue_messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      task_id TEXT NOT NULL,
      payload_json TEXT NOT NULL DEFAULT 'null',
      deliveries INTEGER NOT NULL DEFAULT 0,
      available_at TEXT NOT NULL,
      lease_owner TEXT,
      lease_expires_at TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_queue_messages_available_at ON queue_messages(available_at, id);
    CREATE INDEX IF NOT EXISTS idx_queue_messages_lease_expires_at ON queue_messages(lease_expires_at);
    CREATE INDEX IF NOT EXISTS idx_queue_messages_task_id ON queue_messages(task_id);
  `);
}
