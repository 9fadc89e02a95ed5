export { loadSimulatorConfig } from './simulator-config.js';
