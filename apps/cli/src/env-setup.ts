/**
 * Environment setup for the CLI. Must be imported before any module that creates a logger.
 *
 * The audit log is on by default so every committed batch leaves an entry in logs/.
 * NETSETTLE_CLI_AUDIT_LOG=false turns it off without touching LOGGER_AUDIT_LOG_ENABLED.
 */
if (process.env['NETSETTLE_CLI_AUDIT_LOG'] !== undefined) {
  process.env['LOGGER_AUDIT_LOG_ENABLED'] = process.env['NETSETTLE_CLI_AUDIT_LOG'];
} else if (process.env['LOGGER_AUDIT_LOG_ENABLED'] === undefined) {
  process.env['LOGGER_AUDIT_LOG_ENABLED'] = 'true';
}

export {};
