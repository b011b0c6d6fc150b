export const VERSION = "0.1.0";
export const APP_NAME = "mcp-helper";
export const HISTORY_FILE_VERSION = 1;
export const HISTORY_DIR = "config-history";
export const HISTORY_FILE = "history.json";
export const BACKUP_SUFFIX = ".backup";
export const HASH_ALGORITHM = "sha256";
export const SNAPSHOT_ID_LENGTH = 12;
export const SECURE_FILE_MODE = 0o600;
export const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

// Environment overrides
export const ENV_DATA_DIR = "MCP_HELPER_DATA_DIR";
export const ENV_DEBUG = "MCP_HELPER_DEBUG";

// Exit codes following Unix conventions
export const EXIT_OK = 0; // Success, no drift
export const EXIT_DRIFT = 1; // Live config drifted from history, or dependency unsatisfied
export const EXIT_ERROR = 2; // Runtime error (write failure, missing history, bad input)
