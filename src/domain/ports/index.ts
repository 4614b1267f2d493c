//
//
//

export { RandomSource } from './random';
export { Display } from './display';
