export { ARRAY_ITEM_PREFIX, DEFAULT_ROOT_NAME, buildTreeFromJson, buildTreeFromJsonSyntax } from "./build.js";
export { decodeJsonSyntax, decodeJsonText, escapeControlCharactersInStrings } from "./decode.js";

export type { JsonSyntaxNode } from "./decode.js";

export type { JsonArray, JsonObject, JsonPrimitive, JsonValue } from "./types.js";
