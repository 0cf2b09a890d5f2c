export { normalizeValue, valuesEqual, normalizeFields } from './normalize.js';
export { normalizeKey } from './keys.js';
export {
  escapeLabel,
  joinCollectionPath,
  splitCollectionPath,
  appendToCollectionPath,
  collectionPathDepth,
  canonicalCollectionPath,
} from './collection-path.js';
export { sleep } from './sleep.js';
export type { SleepFn } from './sleep.js';
