/**
 * @stepwise/core - Main entry point
 *
 * Turn/event pipeline and agentic control loop for coding agents (Node.js).
 */

// Agent loop
export * from './agent/index.js';

// Context and compaction
export * from './context/index.js';

// Errors
export * from './errors/index.js';

// Events
export * from './events/index.js';

// LLM
export * from './llm/index.js';

// Logger
export * from './logger/index.js';

// Tools
export * from './tools/index.js';

// Utilities
export * from './utils/index.js';
