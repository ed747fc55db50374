import jsonc from "jsonc-parser";
import type { Node as JsonSyntaxNode, ParseError } from "jsonc-parser";

import type { JsonValue } from "./types.js";

export type { JsonSyntaxNode };

const QUOTE = 0x22;
const BACKSLASH = 0x5c;

function escapeControlCharacter(code: number): string {
  return `\\u${code.toString(16).padStart(4, "0")}`;
}

/**
 * Rewrites raw control characters found inside string literals as `\u00XX`
 * escapes. Characters outside string literals are left alone, so whitespace
 * between tokens keeps its meaning.
 */
export function escapeControlCharactersInStrings(text: string): string {
  let out = "";
  let segmentStart = 0;
  let inString = false;
  let escaped = false;

  for (let index = 0; index < text.length; index += 1) {
    const code = text.charCodeAt(index);

    if (!inString) {
      if (code === QUOTE) {
        inString = true;
      }
      continue;
    }

    if (escaped) {
      escaped = false;
      continue;
    }

    if (code === BACKSLASH) {
      escaped = true;
    } else if (code === QUOTE) {
      inString = false;
    } else if (code < 0x20) {
      out += text.slice(segmentStart, index) + escapeControlCharacter(code);
      segmentStart = index + 1;
    }
  }

  return segmentStart === 0 ? text : out + text.slice(segmentStart);
}

/**
 * `JSON.parse` that also accepts raw control characters (tabs, newlines …)
 * inside string literals. Syntax errors are thrown unchanged.
 */
export function decodeJsonText(text: string): JsonValue {
  const value: JsonValue = JSON.parse(escapeControlCharactersInStrings(text));
  return value;
}

/**
 * Decodes JSON text into a syntax tree whose object members stay in source
 * order, including integer-like keys that a decoded object would list first.
 * Comments, trailing commas and any other deviation from strict JSON raise a
 * `SyntaxError` naming the first problem.
 */
export function decodeJsonSyntax(text: string): JsonSyntaxNode {
  const errors: ParseError[] = [];
  const root = jsonc.parseTree(escapeControlCharactersInStrings(text), errors, {
    disallowComments: true,
    allowTrailingComma: false,
    allowEmptyContent: false
  });

  const first = errors[0];
  if (first !== undefined) {
    throw new SyntaxError(`${jsonc.printParseErrorCode(first.error)} at offset ${String(first.offset)}`);
  }
  if (root === undefined) {
    throw new SyntaxError("ValueExpected at offset 0");
  }

  return root;
}
