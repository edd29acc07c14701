export * from "./interface.js";
export * from "./env.js";
export * from "./empty.js";
export {createWinstonLogger, WinstonLogger} from "./winston.js";
export {ConsoleDynamicLevel} from "./utils/consoleTransport.js";
