export { InMemoryPositionLedger } from './in-memory-position-ledger.js';
