export interface ContextFrame {
  readonly tag: string;
  readonly attributes: Readonly<Record<string, string>>;
}

export interface DomChunk {
  readonly index: number;
  readonly content: string;
  readonly startOffset: number;
  readonly endOffset: number;
  readonly openContextStack: readonly ContextFrame[];
  /** Elements still open at `endOffset`. */
  readonly closingContextStack: readonly ContextFrame[];
  /** Tail of the previous chunk, repeated for orientation only. */
  readonly contextEcho: string;
  readonly estimatedSize: number;
  readonly unsafe: boolean;
}

export interface Pattern {
  readonly fieldName: string;
  readonly selectorExpression: string;
  readonly confidence: number;
  readonly evidenceCount: number;
  readonly lastSeenChunkIndex: number;
}

export interface MemoryCursor {
  readonly offset: number;
  readonly contextStack: readonly ContextFrame[];
}

export interface MemoryState {
  readonly userIntentAnchor: string;
  readonly cursor: MemoryCursor;
  readonly patterns: ReadonlyMap<string, readonly Pattern[]>;
  readonly discarded: ReadonlySet<string>;
  readonly itemCount: number;
  readonly chunksAbsorbed: number;
  readonly pageUnderstanding: string;
}

export type OracleReply =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'rateLimited' }
  | { readonly kind: 'timeout' }
  | { readonly kind: 'refused'; readonly reason?: string };

export interface OracleCallOptions {
  readonly signal?: AbortSignal;
}

export interface OracleCall {
  call(prompt: string, options?: OracleCallOptions): Promise<OracleReply>;
}

export interface HtmlMatch {
  readonly tag: string;
  readonly attributes: Readonly<Record<string, string>>;
}

export type StructureEvent =
  | {
      readonly kind: 'open' | 'void';
      readonly id: number;
      readonly tag: string;
      readonly attributes: Readonly<Record<string, string>>;
      readonly start: number;
      readonly end: number;
    }
  | {
      readonly kind: 'close';
      readonly id: number;
      readonly tag: string;
      readonly start: number;
      readonly end: number;
      readonly implied: boolean;
    }
  | {
      readonly kind: 'opaque';
      readonly start: number;
      readonly end: number;
    };

export interface HtmlCapability {
  resolve(html: string, selector: string): Promise<readonly HtmlMatch[]>;
  parseStructure(html: string): readonly StructureEvent[];
}

export interface Preprocessor {
  clean(rawHtml: string): string;
}
