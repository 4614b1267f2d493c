//
//
//

export { Animator, LifeEngine, TextRenderer, TextRendererOptions } from "./life";
export {
    InvalidDimensionError,
    InvalidParameterError,
    MissingOptionError,
    UnknownPatternError,
} from "./errors";
export { GridSize, GridSnapshot, Position } from "./structs";
export { Display, RandomSource } from "./ports";
