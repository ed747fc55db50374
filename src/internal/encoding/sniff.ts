import { tokenize } from "../tokenizer/tokenize.js";

export interface EncodingSniffOptions {
  readonly transportEncodingLabel?: string;
  readonly maxPrescanBytes?: number;
}

export type EncodingSniffSource = "bom" | "transport" | "meta" | "default";

export interface EncodingSniffResult {
  readonly encoding: string;
  readonly source: EncodingSniffSource;
  /** Length of the byte order mark to skip, 0 when there is none. */
  readonly bomLength: number;
}

export const DEFAULT_ENCODING = "utf-8";
export const DEFAULT_PRESCAN_BYTES = 16_384;

const WINDOWS_1252_ALIASES = new Set([
  "iso-8859-1",
  "iso8859-1",
  "latin1",
  "latin-1",
  "us-ascii"
]);

function detectBom(bytes: Uint8Array): { readonly encoding: string; readonly length: number } | null {
  if (bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return { encoding: "utf-8", length: 3 };
  }

  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
    return { encoding: "utf-16be", length: 2 };
  }

  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
    return { encoding: "utf-16le", length: 2 };
  }

  return null;
}

function stripQuotes(value: string): string {
  const trimmed = value.trim();
  if (
    (trimmed.startsWith("\"") && trimmed.endsWith("\"")) ||
    (trimmed.startsWith("'") && trimmed.endsWith("'"))
  ) {
    return trimmed.slice(1, -1).trim();
  }

  return trimmed;
}

/**
 * Resolves a label to the name `TextDecoder` reports for it, or `null` when
 * the label is unknown. A declared UTF-16 label cannot be right for bytes
 * that were readable as ASCII, so it resolves to UTF-8.
 */
export function canonicalizeLabel(label: string): string | null {
  const normalized = stripQuotes(label).toLowerCase();
  if (normalized.length === 0) {
    return null;
  }

  if (WINDOWS_1252_ALIASES.has(normalized)) {
    return "windows-1252";
  }

  let encoding: string;
  try {
    encoding = new TextDecoder(normalized).encoding.toLowerCase();
  } catch (error) {
    if (error instanceof RangeError) {
      return null;
    }
    throw error;
  }

  if (encoding === "iso-8859-1") {
    return "windows-1252";
  }

  return encoding.startsWith("utf-16") ? DEFAULT_ENCODING : encoding;
}

function decodeLatin1(bytes: Uint8Array): string {
  let out = "";
  for (const value of bytes) {
    out += String.fromCharCode(value);
  }
  return out;
}

function looksLikeMarkup(bytes: Uint8Array): boolean {
  for (const value of bytes) {
    if (value === 0x20 || value === 0x09 || value === 0x0a || value === 0x0d || value === 0x0c) {
      continue;
    }
    return value === 0x3c;
  }
  return false;
}

function extractCharsetFromContent(content: string): string | null {
  const match = content.match(/charset\s*=\s*("[^"]*"|'[^']*'|[^\s;"'>]+)/i);
  const captured = match?.[1];
  return captured ? stripQuotes(captured) : null;
}

/** Looks for `<meta charset>` or a `Content-Type` `http-equiv` in the prefix. */
function sniffMetaCharset(bytes: Uint8Array, maxPrescanBytes: number): string | null {
  const scan = decodeLatin1(bytes.subarray(0, Math.min(bytes.length, maxPrescanBytes)));

  for (const token of tokenize(scan).tokens) {
    if (token.type !== "StartTag" || token.name !== "meta") {
      continue;
    }

    const direct = token.attributes["charset"];
    if (direct) {
      const canonical = canonicalizeLabel(direct);
      if (canonical) {
        return canonical;
      }
    }

    const httpEquiv = token.attributes["http-equiv"]?.toLowerCase();
    const content = token.attributes["content"];
    if (httpEquiv === "content-type" && content) {
      const extracted = extractCharsetFromContent(content);
      const canonical = extracted ? canonicalizeLabel(extracted) : null;
      if (canonical) {
        return canonical;
      }
    }
  }

  return null;
}

/**
 * Picks the encoding for raw input bytes: byte order mark, then the
 * transport label, then a meta prescan for markup, then UTF-8.
 * A transport label that names no known encoding throws a `RangeError`.
 */
export function sniffEncoding(bytes: Uint8Array, options: EncodingSniffOptions = {}): EncodingSniffResult {
  const bom = detectBom(bytes);
  if (bom) {
    return { encoding: bom.encoding, source: "bom", bomLength: bom.length };
  }

  if (options.transportEncodingLabel !== undefined) {
    const transport = canonicalizeLabel(options.transportEncodingLabel);
    if (!transport) {
      throw new RangeError(`Unsupported encoding label: ${options.transportEncodingLabel}`);
    }
    return { encoding: transport, source: "transport", bomLength: 0 };
  }

  if (looksLikeMarkup(bytes)) {
    const prescan = sniffMetaCharset(bytes, options.maxPrescanBytes ?? DEFAULT_PRESCAN_BYTES);
    if (prescan) {
      return { encoding: prescan, source: "meta", bomLength: 0 };
    }
  }

  return { encoding: DEFAULT_ENCODING, source: "default", bomLength: 0 };
}

export function decodeBytes(
  bytes: Uint8Array,
  options: EncodingSniffOptions = {}
): { readonly text: string; readonly sniff: EncodingSniffResult } {
  const sniff = sniffEncoding(bytes, options);
  const decoder = new TextDecoder(sniff.encoding, { ignoreBOM: true });
  return {
    text: decoder.decode(bytes.subarray(sniff.bomLength)),
    sniff
  };
}
