/**
 * SQLite Prepared Statements
 *
 * Pre-defined SQL queries for the outcome store.
 */

const OUTCOME_COLUMNS = `
  id, decision_hash, mrn, predicted_prob_safe, predicted_risk_category,
  actual_outcome, outcome_details, days_to_outcome, outcome_severity,
  recorded_by, recorded_at, outcome_hash, metadata
`;

/**
 * Insert an outcome
 */
export const INSERT_OUTCOME = `
  INSERT INTO outcomes (
    decision_hash, mrn, predicted_prob_safe, predicted_risk_category,
    actual_outcome, outcome_details, days_to_outcome, outcome_severity,
    recorded_by, recorded_at, outcome_hash, metadata
  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
`;

/**
 * Prediction/outcome pairs for replay, in insertion order
 */
export const LIST_PREDICTION_OUTCOMES = `
  SELECT predicted_prob_safe, actual_outcome FROM outcomes ORDER BY id
`;

/**
 * Latest outcome for a decision
 */
export const FIND_LATEST_OUTCOME = `
  SELECT ${OUTCOME_COLUMNS} FROM outcomes
  WHERE decision_hash = ?
  ORDER BY recorded_at DESC, id DESC
  LIMIT 1
`;

/**
 * A patient's outcomes, newest first
 */
export const FIND_OUTCOMES_BY_PATIENT = `
  SELECT ${OUTCOME_COLUMNS} FROM outcomes
  WHERE mrn = ?
  ORDER BY recorded_at DESC, id DESC
  LIMIT ?
`;

/**
 * All outcomes, oldest first
 */
export const LIST_OUTCOMES = `
  SELECT ${OUTCOME_COLUMNS} FROM outcomes
  ORDER BY recorded_at ASC, id ASC
`;

/**
 * Hashed columns of every outcome
 */
export const LIST_INTEGRITY_ROWS = `
  SELECT id, decision_hash, mrn, actual_outcome, recorded_at, outcome_hash
  FROM outcomes ORDER BY id
`;

/**
 * Insert a prior update event
 */
export const INSERT_PRIOR_UPDATE = `
  INSERT INTO prior_updates (
    updated_at, outcome_hash, old_alpha, old_beta, new_alpha, new_beta, learning_rate
  ) VALUES (?, ?, ?, ?, ?, ?, ?)
`;

/**
 * Prior update events, newest first
 */
export const LIST_PRIOR_UPDATES = `
  SELECT updated_at, outcome_hash, old_alpha, old_beta, new_alpha, new_beta, learning_rate
  FROM prior_updates
  ORDER BY updated_at DESC, id DESC
  LIMIT ?
`;

/**
 * Current learning state
 */
export const GET_LEARNING_STATE = `
  SELECT current_alpha, current_beta, n_updates, last_updated, version
  FROM learning_state WHERE id = 1
`;

/**
 * First write of the learning state
 */
export const INSERT_LEARNING_STATE = `
  INSERT INTO learning_state (id, current_alpha, current_beta, n_updates, last_updated, version)
  VALUES (1, ?, ?, ?, ?, 1)
`;

/**
 * Compare-and-swap update of the learning state
 */
export const UPDATE_LEARNING_STATE = `
  UPDATE learning_state
  SET current_alpha = ?, current_beta = ?, n_updates = ?, last_updated = ?, version = version + 1
  WHERE id = 1 AND version = ?
`;

/**
 * Insert a calibration snapshot
 */
export const INSERT_CALIBRATION_SNAPSHOT = `
  INSERT INTO calibration_snapshots (
    snapshot_at, ece, mce, total_predictions, total_safe_outcomes, bucket_data
  ) VALUES (?, ?, ?, ?, ?, ?)
`;

/**
 * Calibration snapshots, newest first
 */
export const LIST_CALIBRATION_SNAPSHOTS = `
  SELECT snapshot_at, ece, mce, total_predictions, total_safe_outcomes, bucket_data
  FROM calibration_snapshots
  ORDER BY snapshot_at DESC, id DESC
  LIMIT ?
`;

/**
 * Insert a generated report
 */
export const INSERT_REPORT = `
  INSERT INTO learning_reports (generated_at, report_type, report_data)
  VALUES (?, ?, ?)
`;

/**
 * Generated reports, newest first
 */
export const LIST_REPORTS = `
  SELECT id, generated_at, report_type, report_data
  FROM learning_reports
  ORDER BY generated_at DESC, id DESC
  LIMIT ?
`;

/**
 * Per-day outcome counts for the most recent days with outcomes
 */
export const DAILY_OUTCOME_STATS = `
  SELECT date(recorded_at) AS day,
         COUNT(*) AS count,
         SUM(CASE WHEN actual_outcome = 'safe' THEN 1 ELSE 0 END) AS safe_count,
         SUM(CASE WHEN actual_outcome = 'adverse' THEN 1 ELSE 0 END) AS adverse_count,
         AVG(predicted_prob_safe) AS avg_prediction
  FROM outcomes
  GROUP BY date(recorded_at)
  ORDER BY day DESC
  LIMIT ?
`;

/**
 * Per risk category counts and prediction agreement
 */
export const RISK_CATEGORY_STATS = `
  SELECT COALESCE(predicted_risk_category, '') AS category,
         COUNT(*) AS count,
         SUM(CASE WHEN actual_outcome = 'safe' THEN 1 ELSE 0 END) AS safe_count,
         SUM(CASE WHEN actual_outcome = 'adverse' THEN 1 ELSE 0 END) AS adverse_count,
         SUM(CASE
               WHEN actual_outcome = 'safe' AND predicted_prob_safe >= 0.5 THEN 1
               WHEN actual_outcome = 'adverse' AND predicted_prob_safe < 0.5 THEN 1
               ELSE 0
             END) AS n_correct
  FROM outcomes
  GROUP BY COALESCE(predicted_risk_category, '')
  ORDER BY category
`;

/**
 * Severity spread of adverse outcomes
 */
export const ADVERSE_SEVERITY_STATS = `
  SELECT AVG(outcome_severity) AS avg_severity,
         MIN(outcome_severity) AS min_severity,
         MAX(outcome_severity) AS max_severity
  FROM outcomes WHERE actual_outcome = 'adverse'
`;
