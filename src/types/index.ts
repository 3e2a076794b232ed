export * from './invoice.js';
export * from './ledger.js';
export * from './voucher.js';
export * from './output.js';
