/**
 * Redaction paths for pino. Database credentials travel in connection
 * strings and pool config, so both are covered.
 */
export const REDACTION_CONFIG: { paths: string[]; censor: string } = {
  paths: [
    'password',
    'secret',
    'token',
    'databaseUrl',
    'connectionString',

    '*.password',
    '*.secret',
    '*.token',
    '*.databaseUrl',
    '*.connectionString',

    'config.database.url',
    'config.*.password',

    'err.config.password',
    'err.config.connectionString',
  ],
  censor: '[REDACTED]',
};
