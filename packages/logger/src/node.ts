import TransportStream from "winston-transport";
import winston from "winston";
import type {Logger as Winston} from "winston";
import {LoggerChild, LogFormat, LogLevel, TimestampFormat} from "./interface.js";
import {ConsoleDynamicLevel} from "./utils/consoleTransport.js";
import {WinstonLogger, readModule} from "./winston.js";

export type LoggerNodeOpts = {
  level: LogLevel;
  /**
   * Enable file output transport if set
   */
  file?: {
    filepath: string;
    /**
     * Log level for file output transport
     */
    level: LogLevel;
  };
  /**
   * Module prefix for all logs
   */
  module?: string;
  /**
   * Rendering format for logs, defaults to "human"
   */
  format?: LogFormat;
  /**
   * Set specific log levels by module, e.g. `{"vouch/prover": "debug"}`
   */
  levelModule?: Record<string, LogLevel>;
  timestampFormat?: TimestampFormat;
};

export type LoggerNodeChildOpts = {
  module: string;
};

export type LoggerNode = LoggerChild & {
  toOpts(): LoggerNodeOpts;
  child(opts: LoggerNodeChildOpts): LoggerNode;
};

/**
 * Logger writing to stdout, and to a file if `opts.file` is set
 */
export function getNodeLogger(opts: LoggerNodeOpts): LoggerNode {
  return WinstonLoggerNode.fromNewTransports(opts);
}

export function getNodeLoggerTransports(opts: LoggerNodeOpts): TransportStream[] {
  const consoleTransport = new ConsoleDynamicLevel({
    // Set defaultLevel, not level, for dynamic level setting of ConsoleDynamicLevel
    defaultLevel: opts.level,
    debugStdout: true,
    handleExceptions: true,
  });

  if (opts.levelModule) {
    for (const [module, level] of Object.entries(opts.levelModule)) {
      consoleTransport.setModuleLevel(module, level);
    }
  }

  const transports: TransportStream[] = [consoleTransport];

  if (opts.file) {
    transports.push(
      new winston.transports.File({
        level: opts.file.level,
        filename: opts.file.filepath,
        handleExceptions: true,
      })
    );
  }

  return transports;
}

export class WinstonLoggerNode extends WinstonLogger implements LoggerNode {
  constructor(
    winston: Winston,
    private readonly opts: LoggerNodeOpts
  ) {
    super(winston);
  }

  static fromOpts(opts: LoggerNodeOpts, transports: TransportStream[]): WinstonLoggerNode {
    const {module, format, timestampFormat} = opts;
    return new WinstonLoggerNode(
      WinstonLoggerNode.createWinstonInstance({module, format, timestampFormat}, transports),
      opts
    );
  }

  static fromNewTransports(opts: LoggerNodeOpts): WinstonLoggerNode {
    return WinstonLoggerNode.fromOpts(opts, getNodeLoggerTransports(opts));
  }

  child(opts: LoggerNodeChildOpts): LoggerNode {
    const childWinston = this.createChildWinston(opts.module);
    return new WinstonLoggerNode(childWinston, {...this.opts, module: readModule(childWinston.defaultMeta)});
  }

  toOpts(): LoggerNodeOpts {
    return this.opts;
  }
}
