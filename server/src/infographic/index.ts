export * from './types.js';
export * from './decode.js';
export * from './encode.js';
export * from './tree.js';
export * from './expansion.js';
export * from './render.js';
export * from './document.js';
export * from './localBuild.js';
export * from './generation.js';
