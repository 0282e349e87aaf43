export * from './breakpoint.js';
export * from './session-phase.js';
export * from './stack.js';
export * from './debug-link.js';
export * from './process-handle.js';
export * from './ui-sink.js';
export * from './document.js';
export * from './debug-mode.js';
