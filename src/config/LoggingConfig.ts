/** Environment variable holding the initial log level name */
export const LOG_LEVEL_ENV = 'DICHROMA_LOG_LEVEL';

/** Level used when the environment variable is unset or unrecognized */
export const DEFAULT_LOG_LEVEL_NAME = 'warn';
