/**
 * Position simulation
 */

export * from './exit-checker.js';
export { Position, type PositionInit, type PositionStatus } from './position.js';
export {
  PositionManager,
  type PositionManagerEvents,
  type PositionManagerOptions,
  type OpenPositionRequest,
} from './position-manager.js';
