//
//
//

export { ConsoleDisplay } from './display';
export { Pattern, PatternDefinition, PatternLibrary } from './patterns';
