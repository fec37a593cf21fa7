export { createHealthRouter } from './health.js';
export { createPoolRouter } from './pools.js';
export { createLedgerRouter } from './ledger.js';
