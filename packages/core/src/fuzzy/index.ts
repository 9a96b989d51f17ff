export { fuzzyMatch, fuzzyAccept } from './accept.js';
export type { FuzzyMatch, FuzzyStage } from './accept.js';
