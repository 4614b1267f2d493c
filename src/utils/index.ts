//
//
//

export * from "./misc";
export { Duration } from "./time";
export { getLogger, setLogLevel } from "./logger";
export { MathRandomSource, SeededRandomSource } from "./random";
