// txn-timer — timed obligations for an XA transaction manager
export * from './core/index.js';
export * from './observability/index.js';
export * from './config/index.js';
export * from './timer/index.js';
export * from './services/index.js';
