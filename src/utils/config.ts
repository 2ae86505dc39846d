import Joi from 'joi';
import type { LogLevel, MoveFailurePolicy } from '../types';

export interface Config {
  logLevel: LogLevel;
  moveFailurePolicy: MoveFailurePolicy;
  reportSuffix: string;
}

const LOG_LEVELS: LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT'];

const configSchema = Joi.object<Config>({
  logLevel: Joi.string()
    .valid(...LOG_LEVELS)
    .required(),
  moveFailurePolicy: Joi.string().valid('halt', 'continue').default('halt').messages({
    'any.only': 'moveFailurePolicy must be either "halt" or "continue"',
  }),
  reportSuffix: Joi.string()
    .pattern(/^_[A-Za-z0-9_]+\.txt$/)
    .default('_non_standard.txt')
    .messages({
      'string.pattern.base':
        'reportSuffix must start with an underscore and end with .txt (letters, digits and underscores only)',
    }),
});

/**
 * Builds the configuration from environment variables and validates it
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    logLevel:
      sanitizeLogLevel(env.LOG_LEVEL) || (env.NODE_ENV === 'production' ? 'INFO' : 'DEBUG'),
    moveFailurePolicy: env.MOVE_FAILURE_POLICY?.trim().toLowerCase() || undefined,
    reportSuffix: env.REPORT_SUFFIX?.trim() || undefined,
  };

  const { error, value } = configSchema.validate(rawConfig);

  if (error) {
    throw new Error(`Configuration validation failed: ${error.message}`);
  }

  return value;
}

/**
 * Normalizes the log level, dropping anything the logger does not know
 */
function sanitizeLogLevel(logLevel?: string): LogLevel | undefined {
  if (!logLevel) return undefined;

  const normalized = logLevel.trim().toUpperCase();

  return LOG_LEVELS.find(level => level === normalized);
}

export const config = loadConfig();

export default config;
