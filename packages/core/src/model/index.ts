export { createTransaction, groupingKey, isFound, isCompatible } from './transaction.js';
export type { TransactionFields } from './transaction.js';
