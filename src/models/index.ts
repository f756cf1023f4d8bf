/**
 * @file Models index
 */

export * from './emotion';
export * from './physiology';
export * from './integrated_state';
export * from './dissociation';
export * from './therapeutic_response';
export * from './session';
export * from './safety';
