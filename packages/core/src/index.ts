export * from "./accent.js";
export * from "./classify.js";
export * from "./errors.js";
export * from "./features.js";
export * from "./notation.js";
export * from "./phoneme-set-id.js";
export * from "./phonemes.js";
export * from "./schemas.js";
export * from "./symbols.js";
export * from "./tokenizer.js";
export * from "./trie.js";
export type * from "./types.js";
export * from "./unicode.js";
