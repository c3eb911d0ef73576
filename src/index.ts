export * from './models.js';
export * from './errors.js';
export * from './adapter.js';
export * from './limiter.js';
export * from './logger.js';
export * from './adapters/index.js';

export * from './detection.js';
export * from './section_state.js';
export * from './sections.js';
export * from './orchestrator.js';
export * from './snapshots.js';
export * from './render.js';

export * from './config.js';
export * from './setup.js';
export * from './integrations.js';

export * from './core/ports.js';
