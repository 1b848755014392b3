export * from './contracts/animation-assembler.js';
export * from './contracts/frame-renderer.js';
export * from './contracts/template-serializer.js';
export * from './entities/template.js';
export * from './entities/text-template.js';
export * from './services/interpolation.js';
export * from './value-objects/base-animation.js';
export * from './value-objects/keyframe.js';
export * from './value-objects/text-style.js';
