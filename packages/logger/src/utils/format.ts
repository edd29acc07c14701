import winston, {format} from "winston";
import type {TransformableInfo} from "logform";
import {VouchError, isEmptyObject, logCtxToJson, logCtxToString} from "@vouch/utils";
import {LoggerOptions, TimestampFormatCode} from "../interface.js";

type Format = ReturnType<typeof winston.format.combine>;

export function getFormat(opts: Partial<LoggerOptions>): Format {
  switch (opts.format) {
    case "json":
      return jsonLogFormat(opts);
    case "human":
      return humanReadableLogFormat(opts);
    default:
      return humanReadableLogFormat(opts);
  }
}

function humanReadableLogFormat(opts: Partial<LoggerOptions>): Format {
  return format.combine(
    ...(opts.timestampFormat?.format === TimestampFormatCode.Hidden
      ? []
      : [format.timestamp({format: "MMM-DD HH:mm:ss.SSS"})]),
    format.colorize(),
    format.printf(humanReadableTemplateFn)
  );
}

function jsonLogFormat(opts: Partial<LoggerOptions>): Format {
  return format.combine(
    ...(opts.timestampFormat?.format === TimestampFormatCode.Hidden ? [] : [format.timestamp()]),
    format((info) => {
      info.context = logCtxToJson(info.context);
      info.error = logCtxToJson(info.error);
      return info;
    })(),
    format.json()
  );
}

/**
 * Winston template function print a human readable string given a log object
 */
function humanReadableTemplateFn(info: TransformableInfo): string {
  const paddingBetweenInfo = 30;

  const infoString = typeof info.module === "string" ? info.module : "";
  const infoPad = paddingBetweenInfo - infoString.length;

  let str = "";

  if (typeof info.timestamp === "string") str += info.timestamp;

  str += `[${infoString}] ${info.level.padStart(infoPad)}: ${String(info.message)}`;

  const {context, error} = info;
  const hasContext = context !== undefined && !isEmptyObject(context);
  if (hasContext) str += " " + logCtxToString(context);
  if (error !== undefined) {
    // VouchError is rendered like context: appended to the message or to the context properties.
    // Any other error is separated from the log message with " - ".
    str += (error instanceof VouchError ? (hasContext ? ", " : " ") : " - ") + logCtxToString(error);
  }

  return str;
}
