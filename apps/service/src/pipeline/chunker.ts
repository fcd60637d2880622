import type { ContextFrame, DomChunk, HtmlCapability, StructureEvent } from '@strata/core';

const CHARS_PER_TOKEN = 4;
const DEFAULT_LOOK_AHEAD_WINDOW = 1000;

export interface ChunkOptions {
  readonly lookAheadWindow?: number;
  /** When false, chunks carry no open-context stack and no echo. */
  readonly preserveContext?: boolean;
}

export interface Chunker {
  chunk(html: string, targetSize: number, overlapHint: number, options?: ChunkOptions): readonly DomChunk[];
}

export interface CreateChunkerOptions {
  readonly html: HtmlCapability;
  readonly lookAheadWindow?: number;
}

interface OpenElement {
  readonly id: number;
  readonly frame: ContextFrame;
}

interface CutResult {
  readonly end: number;
  readonly nextEvent: number;
  readonly stack: OpenElement[];
  readonly unsafe: boolean;
}

export const estimateTokens = (content: string): number => Math.ceil(content.length / CHARS_PER_TOKEN);

const applyEvent = (stack: OpenElement[], event: StructureEvent): void => {
  if (event.kind === 'open') {
    stack.push({ id: event.id, frame: { tag: event.tag, attributes: event.attributes } });
    return;
  }
  if (event.kind === 'close') {
    for (let index = stack.length - 1; index >= 0; index -= 1) {
      if (stack[index].id === event.id) {
        stack.splice(index, 1);
        return;
      }
    }
  }
};

const replayUntil = (
  events: readonly StructureEvent[],
  from: number,
  stack: readonly OpenElement[],
  end: number
): { readonly nextEvent: number; readonly stack: OpenElement[] } => {
  const working = [...stack];
  let index = from;
  while (index < events.length && events[index].end <= end) {
    applyEvent(working, events[index]);
    index += 1;
  }
  return { nextEvent: index, stack: working };
};

const isBeforeTarget = (event: StructureEvent, target: number): boolean =>
  event.end <= target || (event.kind !== 'close' && event.start < target);

const ROOT = -1;

/**
 * Elements opened inside the chunk that may stay open across the cut. The
 * record level is the open element (or the document root) whose children
 * completed inside the chunk cover the most characters; it and its ancestors
 * may stay open, while anything deeper, such as the record in progress at
 * the target, has to close first.
 */
const containersAtTarget = (
  stack: readonly OpenElement[],
  openedHere: ReadonlySet<number>,
  completedChildren: ReadonlyMap<number, number>
): ReadonlySet<number> => {
  let level = ROOT;
  let best = completedChildren.get(ROOT) ?? 0;
  stack.forEach((entry, position) => {
    const covered = completedChildren.get(entry.id) ?? 0;
    if (covered > 0 && covered >= best) {
      level = position;
      best = covered;
    }
  });
  return new Set(
    stack.filter((entry, position) => position <= level && openedHere.has(entry.id)).map((entry) => entry.id)
  );
};

/** Every element opened inside the chunk except the innermost one. */
const ancestorsAtTarget = (stack: readonly OpenElement[], openedHere: ReadonlySet<number>): ReadonlySet<number> => {
  const opened = stack.filter((entry) => openedHere.has(entry.id)).map((entry) => entry.id);
  return new Set(opened.slice(0, -1));
};

/**
 * Finds the earliest offset at or after `target` where every element opened
 * since the chunk start has closed, apart from the containers at the record
 * level. Without such a cut in the window it prefers the document end, then
 * a cut that only closes the innermost element at the target, then a raw
 * split moved past any tag it would cut.
 */
const findCut = (
  html: string,
  events: readonly StructureEvent[],
  from: number,
  stack: readonly OpenElement[],
  target: number,
  limit: number
): CutResult => {
  if (html.length <= target) {
    return { end: html.length, ...replayUntil(events, from, stack, html.length), unsafe: false };
  }

  const working = [...stack];
  const openedAt = new Map<number, number>();
  const completedChildren = new Map<number, number>();
  let allowed: { readonly strict: ReadonlySet<number>; readonly loose: ReadonlySet<number> } | undefined;
  let looseCut: CutResult | undefined;
  let index = from;

  const settle = () => {
    const openedHere = new Set(openedAt.keys());
    allowed = {
      strict: containersAtTarget(working, openedHere, completedChildren),
      loose: ancestorsAtTarget(working, openedHere)
    };
    return allowed;
  };

  while (index < events.length && events[index].end <= limit) {
    const event = events[index];
    if (allowed === undefined && !isBeforeTarget(event, target)) {
      settle();
    }

    if (event.kind === 'close') {
      const start = openedAt.get(event.id);
      if (start !== undefined && allowed === undefined) {
        const position = working.findIndex((entry) => entry.id === event.id);
        const parent = position > 0 ? working[position - 1].id : ROOT;
        completedChildren.set(parent, (completedChildren.get(parent) ?? 0) + event.end - start);
      }
      openedAt.delete(event.id);
    } else if (event.kind === 'open') {
      openedAt.set(event.id, event.start);
    }
    applyEvent(working, event);
    index += 1;

    if (event.end < target) {
      continue;
    }
    const { strict, loose } = allowed ?? settle();
    const stillOpen = [...openedAt.keys()];
    const fitsStrict = stillOpen.every((id) => strict.has(id));
    if (!fitsStrict && (looseCut !== undefined || !stillOpen.every((id) => loose.has(id)))) {
      continue;
    }

    // Zero-length implied closes at the cut belong before it.
    let next = index;
    const closing = [...working];
    while (next < events.length && events[next].kind === 'close' && events[next].end === event.end) {
      applyEvent(closing, events[next]);
      next += 1;
    }
    const cut: CutResult = { end: event.end, nextEvent: next, stack: closing, unsafe: false };
    if (fitsStrict) {
      return cut;
    }
    looseCut = cut;
  }

  if (html.length <= limit) {
    return { end: html.length, ...replayUntil(events, from, stack, html.length), unsafe: false };
  }
  if (looseCut) {
    return looseCut;
  }

  let end = target;
  for (let scan = from; scan < events.length && events[scan].start < end; scan += 1) {
    if (events[scan].end > end) {
      end = events[scan].end;
    }
  }
  return { end, ...replayUntil(events, from, stack, end), unsafe: true };
};

export const createChunker = (options: CreateChunkerOptions): Chunker => {
  const capability = options.html;
  const defaultLookAhead = options.lookAheadWindow ?? DEFAULT_LOOK_AHEAD_WINDOW;

  return {
    chunk(html: string, targetSize: number, overlapHint: number, chunkOptions: ChunkOptions = {}): readonly DomChunk[] {
      if (!Number.isInteger(targetSize) || targetSize < 1) {
        throw new Error(`targetSize must be a positive integer, received ${targetSize}`);
      }
      if (!Number.isInteger(overlapHint) || overlapHint < 0) {
        throw new Error(`overlapHint must be a non-negative integer, received ${overlapHint}`);
      }
      if (html.length === 0) {
        return [];
      }

      const lookAheadWindow = chunkOptions.lookAheadWindow ?? defaultLookAhead;
      const preserveContext = chunkOptions.preserveContext ?? true;
      const events = capability.parseStructure(html);
      const chunks: DomChunk[] = [];

      let start = 0;
      let nextEvent = 0;
      let stack: OpenElement[] = [];

      while (start < html.length) {
        const target = start + targetSize;
        const cut = findCut(html, events, nextEvent, stack, target, target + lookAheadWindow);
        const content = html.slice(start, cut.end);
        const previous = chunks.at(-1);

        chunks.push({
          index: chunks.length,
          content,
          startOffset: start,
          endOffset: cut.end,
          openContextStack: preserveContext ? stack.map((entry) => entry.frame) : [],
          closingContextStack: preserveContext ? cut.stack.map((entry) => entry.frame) : [],
          contextEcho: preserveContext && previous && overlapHint > 0 ? previous.content.slice(-overlapHint) : '',
          estimatedSize: estimateTokens(content),
          unsafe: cut.unsafe
        });

        start = cut.end;
        nextEvent = cut.nextEvent;
        stack = cut.stack;
      }

      return chunks;
    }
  };
};
