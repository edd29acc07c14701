import TransportStream from "winston-transport";
import {MESSAGE, WinstonLogInfo} from "../../src/interface.js";
import {ConsoleDynamicLevel} from "../../src/utils/consoleTransport.js";

// biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI color codes
const ansiColor = /\u001b\[\d+m/g;

/**
 * Removes color codes and the padding before the level, which depends on whether colors are enabled
 */
export function normalizeLine(str: string): string {
  return str.replace(ansiColor, "").replace(/^([^\]]*\]) +/, "$1 ");
}

/**
 * Keeps each formatted log line in memory
 */
export class CaptureTransport extends TransportStream {
  readonly lines: string[] = [];

  log(info: WinstonLogInfo, next: () => void): void {
    this.lines.push(normalizeLine(info[MESSAGE]));
    next();
  }
}

export class CaptureConsoleDynamicLevel extends ConsoleDynamicLevel {
  readonly lines: string[] = [];

  log(info: WinstonLogInfo, next: () => void): void {
    this.lines.push(normalizeLine(info[MESSAGE]));
    next();
  }
}

export function flushLogs(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
