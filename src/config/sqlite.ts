import Database from 'better-sqlite3'

export const SCHEMA = `
  -- Users table
  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    username TEXT UNIQUE NOT NULL,
    email TEXT UNIQUE NOT NULL,
    password_hash TEXT NOT NULL,
    name TEXT,
    role TEXT NOT NULL DEFAULT 'citizen',  -- 'citizen' | 'authority' | 'admin'
    points INTEGER NOT NULL DEFAULT 0,
    total_complaints INTEGER NOT NULL DEFAULT 0,
    resolved_complaints INTEGER NOT NULL DEFAULT 0,
    fake_complaints INTEGER NOT NULL DEFAULT 0,
    pending_complaints INTEGER NOT NULL DEFAULT 0 CHECK (pending_complaints >= 0),
    manual_points INTEGER NOT NULL DEFAULT 0,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  -- Complaints table
  CREATE TABLE IF NOT EXISTS complaints (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    issue_type TEXT NOT NULL DEFAULT 'unknown',
    description TEXT NOT NULL,
    location TEXT,
    status TEXT NOT NULL DEFAULT 'submitted',  -- 'submitted' | 'in_progress' | 'resolved' | 'rejected' | 'closed'
    fake BOOLEAN NOT NULL DEFAULT 0,
    fake_score REAL NOT NULL DEFAULT 0,
    fake_penalty_applied BOOLEAN NOT NULL DEFAULT 0,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
  );

  -- Manual point adjustments made by admins
  CREATE TABLE IF NOT EXISTS point_adjustments (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    actor_id TEXT,
    delta INTEGER NOT NULL,
    reason TEXT,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE,
    FOREIGN KEY (actor_id) REFERENCES users(id) ON DELETE SET NULL
  );

  CREATE INDEX IF NOT EXISTS idx_complaints_user_id ON complaints(user_id);
  CREATE INDEX IF NOT EXISTS idx_complaints_status ON complaints(status);
  CREATE INDEX IF NOT EXISTS idx_complaints_created_at ON complaints(created_at);
  CREATE INDEX IF NOT EXISTS idx_users_points ON users(points);
  CREATE INDEX IF NOT EXISTS idx_users_email ON users(email);
`

export const createDatabase = (filename: string): Database.Database => {
  const database = new Database(filename)

  // WAL is not available for in-memory databases
  if (filename !== ':memory:') {
    database.pragma('journal_mode = WAL')
  }
  database.pragma('foreign_keys = ON')
  database.pragma('synchronous = NORMAL')
  database.pragma('busy_timeout = 5000')

  database.exec(SCHEMA)
  return database
}

const db = createDatabase(process.env.SQLITE_PATH || 'civic-eye.db')

if (process.env.NODE_ENV !== 'test') {
  console.log('✅ SQLite database initialized')
}

export default db
