//
//
//

export { LifeEngine } from './engine';
export { TextRenderer, TextRendererOptions } from './renderer';
export { Animator } from './animator';
