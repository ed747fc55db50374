export interface StartTagToken {
  readonly type: "StartTag";
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly selfClosing: boolean;
}

export interface EndTagToken {
  readonly type: "EndTag";
  readonly name: string;
}

export interface CommentToken {
  readonly type: "Comment";
  readonly data: string;
}

export interface DoctypeToken {
  readonly type: "Doctype";
  readonly name: string;
}

export interface CharacterToken {
  readonly type: "Character";
  readonly data: string;
}

export interface EOFToken {
  readonly type: "EOF";
}

export type MarkupToken =
  | StartTagToken
  | EndTagToken
  | CommentToken
  | DoctypeToken
  | CharacterToken
  | EOFToken;

export interface TokenizerParseError {
  readonly code: string;
  readonly index: number;
}

export interface TokenizeOptions {
  /** Tags whose content is read as raw text rather than markup. */
  readonly rawTextTags?: ReadonlySet<string>;
  readonly maxParseErrors?: number;
}

export interface TokenizeResult {
  readonly tokens: readonly MarkupToken[];
  readonly errors: readonly TokenizerParseError[];
}
