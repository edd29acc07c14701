import {LEVEL, MESSAGE} from "triple-beam";
import {LogLevel, LogLevels, Logger, LogHandler, LogData} from "@vouch/utils";

export {LogLevel, LogLevels, LEVEL, MESSAGE};
export type {Logger, LogHandler, LogData};

export const logLevelNum: {[K in LogLevel]: number} = {
  [LogLevel.error]: 0,
  [LogLevel.warn]: 1,
  [LogLevel.info]: 2,
  [LogLevel.verbose]: 3,
  [LogLevel.debug]: 4,
  [LogLevel.trace]: 5,
};

export const defaultLogLevel = LogLevel.info;

export type LogFormat = "human" | "json";
export const logFormats: LogFormat[] = ["human", "json"];

export enum TimestampFormatCode {
  DateRegular = "regular",
  Hidden = "hidden",
}
export type TimestampFormat = {format: TimestampFormatCode.DateRegular} | {format: TimestampFormatCode.Hidden};

export interface LoggerOptions {
  level?: LogLevel;
  module?: string;
  format?: LogFormat;
  timestampFormat?: TimestampFormat;
}

export type LoggerChildOpts = {
  module: string;
};

/**
 * Logger that can derive module scoped children, `child({module: "b"})` of module `a` logs as `a/b`
 */
export type LoggerChild = Logger & {
  trace: LogHandler;
  child(options: LoggerChildOpts): LoggerChild;
};

export interface WinstonLogInfo {
  module: string;
  [LEVEL]: LogLevel;
  [MESSAGE]: string;
}
