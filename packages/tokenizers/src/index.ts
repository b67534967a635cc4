/**
 * @bytepair/tokenizers -- byte-level BPE training and the encode/decode codec.
 */
export { BpeTokenizer } from "./bpe.js";
export { Vocabulary } from "./vocabulary.js";
export { SpecialTokenMatcher, type Segment } from "./special.js";
export { trainMerges } from "./trainer.js";
export { applyKnownMerges, encodeBytes, encodeText } from "./encoder.js";
export { decodeBytes, decodeText } from "./decoder.js";
export {
  PAIR_STRIDE,
  pairKey,
  unpackPair,
  countPairs,
  mostFrequentPair,
  applyMerge,
} from "./pairs.js";
