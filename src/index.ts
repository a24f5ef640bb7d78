/**
 * X12 document tree
 *
 * Parse ANSI X12 interchanges into Interchange > FunctionalGroup >
 * Transaction > Segment trees, validate their envelopes, and write them back
 * out as X12 text.
 */

export * from './x12/index.js';
export {
  LogLevel,
  getLogger,
  initializeLogging,
  setGlobalLevel,
  getGlobalLevel,
  shutdownLogging,
  setComponentLevel,
  clearComponentLevel,
} from './logging/index.js';
