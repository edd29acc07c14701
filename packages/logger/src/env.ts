import {LogLevel, LogLevels} from "@vouch/utils";
import {getEmptyLogger} from "./empty.js";
import {LogFormat, LoggerChild, TimestampFormat, TimestampFormatCode, logFormats} from "./interface.js";
import {getNodeLogger, LoggerNodeOpts} from "./node.js";

export function getEnvLogLevel(): LogLevel | null {
  const level = process.env.LOG_LEVEL;
  if (level) return parseLogLevel(level);
  if (process.env.DEBUG) return LogLevel.debug;
  if (process.env.VERBOSE) return LogLevel.verbose;
  return null;
}

/**
 * Logger configured from LOG_LEVEL, LOG_FORMAT and LOG_TIMESTAMP_FORMAT. Returns an empty logger if no level is set.
 */
export function getEnvLogger(opts?: Partial<LoggerNodeOpts>): LoggerChild {
  const level = opts?.level ?? getEnvLogLevel();
  const format = opts?.format ?? parseLogFormat(process.env.LOG_FORMAT);
  const timestampFormat = opts?.timestampFormat ?? parseTimestampFormat(process.env.LOG_TIMESTAMP_FORMAT);

  if (level != null) {
    return getNodeLogger({...opts, level, format, timestampFormat});
  }

  return getEmptyLogger();
}

function parseLogLevel(value: string): LogLevel {
  const level = LogLevels.find((l) => l === value);
  if (level === undefined) {
    throw Error(`Invalid LOG_LEVEL '${value}', expected one of ${LogLevels.join(", ")}`);
  }
  return level;
}

function parseLogFormat(value: string | undefined): LogFormat | undefined {
  return logFormats.find((f) => f === value);
}

function parseTimestampFormat(value: string | undefined): TimestampFormat | undefined {
  switch (value) {
    case TimestampFormatCode.Hidden:
      return {format: TimestampFormatCode.Hidden};
    case TimestampFormatCode.DateRegular:
      return {format: TimestampFormatCode.DateRegular};
    default:
      return undefined;
  }
}
