import {LoggerChild} from "./interface.js";

export function getEmptyLogger(): LoggerChild {
  const logger: LoggerChild = {
    error: function error(): void {
      // Do nothing
    },
    warn: function warn(): void {
      // Do nothing
    },
    info: function info(): void {
      // Do nothing
    },
    verbose: function verbose(): void {
      // Do nothing
    },
    debug: function debug(): void {
      // Do nothing
    },
    trace: function trace(): void {
      // Do nothing
    },
    child: () => logger,
  };
  return logger;
}
