/**
 * Shared constants for unitmedic.
 */

import type { Ownership, TimingConfig } from "./types.js";

export const VERSION = "0.3.0";

/** Config file looked up in the deployment directory */
export const CONFIG_FILENAME = "unitmedic.json";

export const DEFAULT_OWNERSHIP: Ownership = { user: "www-data", group: "www-data" } as const;

export const DEFAULT_UNIT_DIRECTORY = "/etc/systemd/system";

export const DEFAULT_TIMING: TimingConfig = {
  stopTimeoutMs: 3000,
  startTimeoutMs: 5000,
  settleMs: 1000,
  pollIntervalMs: 500,
} as const;

/** Below this size the database is probably empty */
export const DEFAULT_MIN_DATABASE_BYTES = 10_000;

export const DEFAULT_LOG = { path: "bot.log", lines: 30 } as const;

export const DEFAULT_STATUS_LINES = 20;

export const DEFAULT_REQUIRED_CONFIG = [".env"];
export const DEFAULT_OPTIONAL_CONFIG = ["google_credentials.json"];

/**
 * Paths never mirrored to the server: virtualenv, database, logs, VCS metadata,
 * caches, tests, notes and secrets.
 */
export const DEFAULT_EXCLUDES = [
  "venv",
  "*.db",
  "*.log",
  ".git",
  "__pycache__",
  ".pytest_cache",
  "tests",
  "deploy/*.md",
  ".env",
  "*credentials*.json",
];
