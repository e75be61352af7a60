export { SimpleTokenizer, tokenizeToTerms } from "./simpleTokenizer.js";
export { MemoryClassStats, ClassStatsReader } from "./memoryClassStats.js";
export { NaiveBayesModel, DEFAULT_SMOOTHING, type NaiveBayesOptions } from "./naiveBayesModel.js";
export {
  SNAPSHOT_VERSION,
  toSnapshot,
  fromSnapshot,
  parseSnapshot,
  type ClassSnapshot,
  type ModelSnapshot,
} from "./modelSnapshot.js";
