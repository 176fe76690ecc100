// ---------------------------------------------------------------------------
// Schema DDL
// ---------------------------------------------------------------------------

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    username TEXT,
    location TEXT,
    blocked INTEGER NOT NULL DEFAULT 0,
    registered_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS subscriptions (
    user_id TEXT PRIMARY KEY,
    status TEXT NOT NULL DEFAULT 'trial',
    approved INTEGER NOT NULL DEFAULT 0,
    expires_at INTEGER,
    paused_until INTEGER,
    resume_status TEXT,
    updated_at INTEGER NOT NULL,
    FOREIGN KEY (user_id) REFERENCES users(id)
  );

  CREATE TABLE IF NOT EXISTS preferences (
    user_id TEXT NOT NULL,
    product_id TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    PRIMARY KEY (user_id, product_id),
    FOREIGN KEY (user_id) REFERENCES users(id)
  );

  CREATE TABLE IF NOT EXISTS alert_settings (
    user_id TEXT PRIMARY KEY,
    cadence TEXT NOT NULL DEFAULT 'instant',
    quiet_start INTEGER,
    quiet_end INTEGER,
    FOREIGN KEY (user_id) REFERENCES users(id)
  );

  CREATE TABLE IF NOT EXISTS pending_alerts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL,
    product_id TEXT NOT NULL,
    location TEXT NOT NULL,
    detected_at INTEGER NOT NULL,
    claim_id TEXT,
    claimed_at INTEGER,
    FOREIGN KEY (user_id) REFERENCES users(id)
  );

  CREATE TABLE IF NOT EXISTS product_status_cache (
    product_id TEXT NOT NULL,
    location TEXT NOT NULL,
    available INTEGER NOT NULL,
    observed_at INTEGER NOT NULL,
    PRIMARY KEY (product_id, location)
  );

  CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_users_location ON users(location);
  CREATE INDEX IF NOT EXISTS idx_subscriptions_status ON subscriptions(status);
  CREATE INDEX IF NOT EXISTS idx_pending_alerts_user ON pending_alerts(user_id, claim_id);
  -- One queued alert per (user, product, location); a row claimed by a digest in flight does not count
  CREATE UNIQUE INDEX IF NOT EXISTS idx_pending_alerts_unclaimed
    ON pending_alerts(user_id, product_id, location) WHERE claim_id IS NULL;
`;
