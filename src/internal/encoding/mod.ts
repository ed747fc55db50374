export {
  DEFAULT_ENCODING,
  DEFAULT_PRESCAN_BYTES,
  canonicalizeLabel,
  decodeBytes,
  sniffEncoding
} from "./sniff.js";

export type { EncodingSniffOptions, EncodingSniffResult, EncodingSniffSource } from "./sniff.js";
