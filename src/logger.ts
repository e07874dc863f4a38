import { createLogger, format, Logger, LoggerOptions, transports } from 'winston';
import { Config, loadConfig, LogLevel } from './config';
import { InvalidConfigError } from './errors';

const developmentEnvs = ['local', 'development'];

export function getLoggerOptions(config: Config): LoggerOptions {
  const isDevelopment = developmentEnvs.includes(config.nodeEnv);
  const level: LogLevel = config.logLevel ?? (isDevelopment ? 'debug' : 'info');

  return {
    level,
    silent: config.nodeEnv === 'test',
    transports: [
      new transports.Console({
        level,
        format: isDevelopment ? getLocalFormat() : getProductionFormat(),
      }),
    ],
  };
}

function getLocalFormat() {
  return format.combine(
    format.printf(({ message, stack }) =>
      [message, stack].filter(Boolean).join('\n'),
    ),
  );
}

function getProductionFormat() {
  return format.combine(
    format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss',
    }),
    format.json(),
  );
}

/**
 * An unusable LOG_LEVEL falls back to the environment's default level and is reported as a warning.
 */
export function createAppLogger(env: { [name: string]: string | undefined } = process.env): Logger {
  let config: Config;
  let configError: InvalidConfigError | null = null;
  try {
    config = loadConfig(env);
  } catch (e) {
    if (!(e instanceof InvalidConfigError)) {
      throw e;
    }
    configError = e;
    config = loadConfig({ NODE_ENV: env.NODE_ENV });
  }

  const created = createLogger(getLoggerOptions(config));
  if (configError) {
    created.warn(`${configError.message}, using level ${created.level}`);
  }
  return created;
}

export const logger: Logger = createAppLogger();
