export { DEFAULT_RAW_TEXT_TAGS, tokenize } from "./tokenize.js";

export type {
  CharacterToken,
  CommentToken,
  DoctypeToken,
  EOFToken,
  EndTagToken,
  MarkupToken,
  StartTagToken,
  TokenizeOptions,
  TokenizeResult,
  TokenizerParseError
} from "./tokens.js";
