/**
 * SQLite Schema Definition
 *
 * Tables for the outcome learning loop:
 * - Append-only outcomes ledger
 * - Calibration snapshots
 * - Prior update events
 * - Generated learning reports
 * - Single-row current learning state, versioned for compare-and-swap
 */

/**
 * Main schema SQL
 */
export const SCHEMA = `
-- Outcomes ledger (append-only)
CREATE TABLE IF NOT EXISTS outcomes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  decision_hash TEXT NOT NULL,
  mrn TEXT NOT NULL,
  predicted_prob_safe REAL NOT NULL,
  predicted_risk_category TEXT,
  actual_outcome TEXT NOT NULL,
  outcome_details TEXT,
  days_to_outcome INTEGER,
  outcome_severity INTEGER,
  recorded_by TEXT NOT NULL,
  recorded_at TEXT NOT NULL,
  outcome_hash TEXT NOT NULL UNIQUE,
  metadata TEXT,
  UNIQUE(decision_hash, recorded_at)
);

-- Periodic calibration snapshots
CREATE TABLE IF NOT EXISTS calibration_snapshots (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  snapshot_at TEXT NOT NULL,
  ece REAL NOT NULL,
  mce REAL NOT NULL,
  total_predictions INTEGER,
  total_safe_outcomes INTEGER,
  bucket_data TEXT NOT NULL
);

-- Prior update events
CREATE TABLE IF NOT EXISTS prior_updates (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  updated_at TEXT NOT NULL,
  outcome_hash TEXT,
  old_alpha REAL NOT NULL,
  old_beta REAL NOT NULL,
  new_alpha REAL NOT NULL,
  new_beta REAL NOT NULL,
  learning_rate REAL NOT NULL
);

-- Generated reports (opaque JSON)
CREATE TABLE IF NOT EXISTS learning_reports (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  generated_at TEXT NOT NULL,
  report_type TEXT NOT NULL,
  report_data TEXT NOT NULL
);

-- Current learning state (singleton row)
CREATE TABLE IF NOT EXISTS learning_state (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  current_alpha REAL NOT NULL,
  current_beta REAL NOT NULL,
  n_updates INTEGER DEFAULT 0,
  last_updated TEXT NOT NULL,
  version INTEGER NOT NULL DEFAULT 1
);

-- Indexes for common queries
CREATE INDEX IF NOT EXISTS idx_outcomes_mrn ON outcomes(mrn);
CREATE INDEX IF NOT EXISTS idx_outcomes_decision ON outcomes(decision_hash);
CREATE INDEX IF NOT EXISTS idx_outcomes_recorded ON outcomes(recorded_at);
CREATE INDEX IF NOT EXISTS idx_outcomes_outcome ON outcomes(actual_outcome);
CREATE INDEX IF NOT EXISTS idx_snapshots_at ON calibration_snapshots(snapshot_at);
CREATE INDEX IF NOT EXISTS idx_prior_updates_at ON prior_updates(updated_at);
`;

/**
 * Schema version, kept in PRAGMA user_version
 */
export const SCHEMA_VERSION = 1;
