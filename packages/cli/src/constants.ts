export const EXIT_SUCCESS = 0;
export const EXIT_USAGE_ERROR = 2;
export const EXIT_NOT_FOUND = 3;
export const EXIT_RUNTIME_ERROR = 4;

export const RUN_USAGE =
  'Usage: runwright run --workflow <name> --message <text> [--base-branch <branch>] [--max-turns <n>] [--timeout-seconds <n>] [--session-id <id>] [--run-id <id>] [--no-follow]';
export const STATUS_USAGE = 'Usage: runwright status --run <run_id> [--logs <none|tail|full>] [--tail <n>]';
export const RECOVER_USAGE = 'Usage: runwright recover';
export const WORKFLOWS_USAGE = 'Usage: runwright workflows <sync|list>';
export const WORKFLOWS_SYNC_USAGE = 'Usage: runwright workflows sync';
export const WORKFLOWS_LIST_USAGE = 'Usage: runwright workflows list';
export const LOGS_USAGE = 'Usage: runwright logs <show|summary|cleanup>';
export const LOGS_SHOW_USAGE = 'Usage: runwright logs show --run <run_id> [--tail <n>]';
export const LOGS_SUMMARY_USAGE = 'Usage: runwright logs summary --run <run_id>';
export const LOGS_CLEANUP_USAGE = 'Usage: runwright logs cleanup --max-age-days <days>';
export const WORKSPACES_USAGE = 'Usage: runwright workspaces list';
export const REAP_USAGE = 'Usage: runwright reap [--max-age-hours <hours>] [--dry-run]';

export const DEFAULT_REAP_MAX_AGE_HOURS = 48;
