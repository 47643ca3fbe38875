/**
 * Retention and timing defaults shared by the session, safety and task layers.
 * All values are in seconds unless otherwise noted. Config may override most of them.
 */
export const RETENTION = {
  /** Idle time after which a session is evicted (1 hour) */
  SESSION_IDLE: 60 * 60,

  /** Interval between idle-session sweeps */
  SESSION_SWEEP_INTERVAL: 60,

  /** Max messages kept in a session's history */
  MAX_SESSION_MESSAGES: 50,

  /** Trailing history window sent to the model */
  CONVERSATION_WINDOW: 20,

  /** Deadline for a confirmation prompt raised by the conversation loop (5 minutes) */
  CONFIRMATION_TIMEOUT: 5 * 60,

  /** Default deadline for a task gate step (5 minutes) */
  GATE_TIMEOUT: 5 * 60,

  /** Backups retained per session */
  BACKUPS_PER_SESSION: 10,

  /** Window for counting invalid confirmation responses (5 minutes) */
  CONFIRMATION_ABUSE_WINDOW: 5 * 60,
} as const;
