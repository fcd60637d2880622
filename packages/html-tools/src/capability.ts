import { load, type CheerioAPI } from 'cheerio';
import { ElementType } from 'domelementtype';
import { hasChildren, isTag, type AnyNode, type Element, type ParentNode } from 'domhandler';

import type { HtmlCapability, HtmlMatch, StructureEvent } from '@strata/core';

const isElementNode = (node: AnyNode | null | undefined): node is Element =>
  node !== null && node !== undefined && isTag(node);

const toStructureEvents = (root: ParentNode): StructureEvent[] => {
  const events: StructureEvent[] = [];
  let nextId = 0;

  const visit = (parent: ParentNode) => {
    for (const child of parent.children) {
      if (isElementNode(child)) {
        visitElement(child);
        continue;
      }

      const isOpaque =
        child.type === ElementType.Comment ||
        child.type === ElementType.Directive ||
        child.type === ElementType.CDATA;
      const location = child.sourceCodeLocation;
      if (isOpaque && location) {
        events.push({ kind: 'opaque', start: location.startOffset, end: location.endOffset });
      }
    }
  };

  const visitElement = (element: Element) => {
    const location = element.sourceCodeLocation;
    const startTag = location?.startTag;
    if (!location || !startTag) {
      // Parser-implied elements (html, head, body) have no source span.
      visit(element);
      return;
    }

    const id = nextId;
    nextId += 1;
    const attributes = { ...element.attribs };

    if (!location.endTag && element.children.length === 0 && location.endOffset === startTag.endOffset) {
      events.push({
        kind: 'void',
        id,
        tag: element.name,
        attributes,
        start: startTag.startOffset,
        end: startTag.endOffset
      });
      return;
    }

    events.push({
      kind: 'open',
      id,
      tag: element.name,
      attributes,
      start: startTag.startOffset,
      end: startTag.endOffset
    });
    visit(element);

    if (location.endTag) {
      events.push({
        kind: 'close',
        id,
        tag: element.name,
        start: location.endTag.startOffset,
        end: location.endTag.endOffset,
        implied: false
      });
    } else {
      const lastEnd = events[events.length - 1]?.end ?? startTag.endOffset;
      const offset = Math.max(location.endOffset, lastEnd);
      events.push({ kind: 'close', id, tag: element.name, start: offset, end: offset, implied: true });
    }
  };

  visit(root);

  const rank = (event: StructureEvent): number => (event.kind === 'close' ? 0 : 1);
  return events
    .map((event, order) => ({ event, order }))
    .sort((a, b) => a.event.start - b.event.start || rank(a.event) - rank(b.event) || a.order - b.order)
    .map(({ event }) => event);
};

/**
 * Selector resolution and structure scanning over cheerio. The last parsed
 * document is memoized because compilation resolves many selectors against
 * the same source string.
 */
export const createHtmlCapability = (): HtmlCapability => {
  let cached: { readonly html: string; readonly $: CheerioAPI } | undefined;

  const loadDocument = (html: string): CheerioAPI => {
    if (cached && cached.html === html) {
      return cached.$;
    }
    const $ = load(html);
    cached = { html, $ };
    return $;
  };

  return {
    resolve(html: string, selector: string): Promise<readonly HtmlMatch[]> {
      if (!selector.trim()) {
        return Promise.reject(new Error('Selector is required for html.resolve'));
      }
      try {
        const $ = loadDocument(html);
        const matches = $(selector)
          .toArray()
          .filter(isElementNode)
          .map((element): HtmlMatch => ({ tag: element.name, attributes: { ...element.attribs } }));
        return Promise.resolve(matches);
      } catch (error) {
        return Promise.reject(error);
      }
    },
    parseStructure(html: string): readonly StructureEvent[] {
      const $ = load(html, { sourceCodeLocationInfo: true });
      const root = $.root()[0];
      return hasChildren(root) ? toStructureEvents(root) : [];
    }
  };
};
