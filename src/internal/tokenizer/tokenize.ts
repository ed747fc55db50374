import { Tokenizer, TokenizerMode, type TokenHandler } from "parse5";

import type {
  MarkupToken,
  TokenizeOptions,
  TokenizeResult,
  TokenizerParseError
} from "./tokens.js";

export const DEFAULT_RAW_TEXT_TAGS: ReadonlySet<string> = new Set(["script", "style"]);

function mergeAdjacentCharacterTokens(tokens: readonly MarkupToken[]): MarkupToken[] {
  const merged: MarkupToken[] = [];

  for (const token of tokens) {
    const previous = merged[merged.length - 1];
    if (token.type === "Character" && previous?.type === "Character") {
      merged[merged.length - 1] = {
        type: "Character",
        data: previous.data + token.data
      };
      continue;
    }

    merged.push(token);
  }

  return merged;
}

/**
 * Runs the parse5 tokenizer over the whole input and returns its tokens in
 * source order. Exceptions thrown by the tokenizer propagate to the caller.
 */
export function tokenize(input: string, options: TokenizeOptions = {}): TokenizeResult {
  const rawTextTags = options.rawTextTags ?? DEFAULT_RAW_TEXT_TAGS;
  const tokens: MarkupToken[] = [];
  const errors: TokenizerParseError[] = [];

  const handler: TokenHandler = {
    onStartTag(token) {
      // Repeated attributes never reach here: the tokenizer keeps the first
      // and reports `duplicate-attribute`.
      const attrs: Record<string, string> = Object.fromEntries(token.attrs.map((attr) => [attr.name, attr.value]));

      tokens.push({
        type: "StartTag",
        name: token.tagName,
        attributes: Object.freeze(attrs),
        selfClosing: token.selfClosing
      });

      // The tokenizer alone never leaves the data state; the tree
      // construction stage is what switches it for raw-text elements.
      if (!token.selfClosing && rawTextTags.has(token.tagName)) {
        tokenizer.state = token.tagName === "script" ? TokenizerMode.SCRIPT_DATA : TokenizerMode.RAWTEXT;
      }
    },
    onEndTag(token) {
      tokens.push({
        type: "EndTag",
        name: token.tagName
      });
    },
    onComment(token) {
      tokens.push({
        type: "Comment",
        data: token.data
      });
    },
    onDoctype(token) {
      tokens.push({
        type: "Doctype",
        name: token.name ?? ""
      });
    },
    onCharacter(token) {
      tokens.push({ type: "Character", data: token.chars });
    },
    onWhitespaceCharacter(token) {
      tokens.push({ type: "Character", data: token.chars });
    },
    onNullCharacter(token) {
      tokens.push({ type: "Character", data: token.chars });
    },
    onParseError(error) {
      if (options.maxParseErrors !== undefined && errors.length >= options.maxParseErrors) {
        return;
      }

      errors.push({
        code: error.code,
        index: error.startOffset
      });
    },
    onEof() {
      // No-op.
    }
  };

  const tokenizer = new Tokenizer({ sourceCodeLocationInfo: false }, handler);
  tokenizer.write(input, true);

  return {
    tokens: [...mergeAdjacentCharacterTokens(tokens), { type: "EOF" }],
    errors
  };
}
