export {
  CappedMultiset,
  cappedMultiset,
  type CappedMultisetOptions,
} from './capped-multiset.js';
export {InvalidInput} from './error/invalid-input.js';
export {
  capSchema,
  parseCap,
  parseValues,
  valueSchema,
  valuesSchema,
  type Cap,
} from './schema.js';
