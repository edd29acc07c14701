import {Logger, transports} from "winston";
import {LEVEL, LogLevel, WinstonLogInfo} from "../interface.js";

/**
 * Console transport that filters by a log level picked per `info.module`
 */
export class ConsoleDynamicLevel extends transports.Console {
  private readonly levelByModule = new Map<string, LogLevel>();
  private readonly defaultLevel: LogLevel;

  // Properties from TransportStream that are not in the types, set when piped from a logger
  declare private readonly levels: Record<LogLevel, number>;
  declare private parent?: Logger;

  constructor(opts: {defaultLevel: LogLevel} & transports.ConsoleTransportOptions) {
    super(opts);

    this.defaultLevel = opts.defaultLevel;

    // Set level and parent to undefined so that underlying transport logs everything
    this.level = undefined;
  }

  setModuleLevel(module: string, level: LogLevel): void {
    this.levelByModule.set(module, level);
  }

  deleteModuleLevel(module: string): boolean {
    return this.levelByModule.delete(module);
  }

  _write(info: WinstonLogInfo, enc: BufferEncoding, callback: (error?: Error | null) => void): void {
    const moduleLevel = this.levelByModule.get(info.module) ?? this.defaultLevel;

    // levels = {error: 0, warn: 1, info: 2, ...}, min number is highest priority
    if (this.levels[moduleLevel] >= this.levels[info[LEVEL]]) {
      if (this.parent) {
        this.parent = undefined;
      }

      super._write(info, enc, callback);
    } else {
      callback(null);
    }
  }
}
