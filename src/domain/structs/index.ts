//
//
//

export { GridSize } from './grid';
export { Position } from './location';
export { GridSnapshot } from './snapshot';
