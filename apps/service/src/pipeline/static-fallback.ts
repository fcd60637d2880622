import {
  ExtractionSchemaSchema,
  SchemaGenerationError,
  type ExtractionSchema,
  type FieldSelector,
  type HtmlCapability,
  type StructureEvent
} from '@strata/core';

import { createSilentLogger, type Logger } from '../logger.js';

interface EntityRule {
  readonly name: string;
  readonly intentWords: readonly string[];
  readonly classHints: readonly string[];
  readonly tags: readonly string[];
  readonly attribute?: string;
}

const HEADINGS = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'];

export const ENTITY_RULES: readonly EntityRule[] = [
  { name: 'title', intentWords: ['title', 'name', 'heading', 'headline', 'job', 'role', 'position'], classHints: ['title', 'name', 'heading', 'headline'], tags: HEADINGS },
  { name: 'price', intentWords: ['price', 'cost', 'amount'], classHints: ['price', 'cost', 'amount'], tags: [] },
  { name: 'description', intentWords: ['description', 'summary', 'detail', 'excerpt'], classHints: ['description', 'summary', 'desc', 'excerpt', 'snippet'], tags: ['p'] },
  { name: 'link', intentWords: ['link', 'url', 'href'], classHints: ['link', 'url'], tags: ['a'], attribute: 'href' },
  { name: 'image', intentWords: ['image', 'photo', 'picture', 'thumbnail', 'logo'], classHints: ['image', 'img', 'photo', 'thumb', 'logo'], tags: ['img'], attribute: 'src' },
  { name: 'date', intentWords: ['date', 'posted', 'published', 'time'], classHints: ['date', 'time', 'posted'], tags: ['time'] },
  { name: 'author', intentWords: ['author', 'writer', 'poster'], classHints: ['author', 'byline', 'writer'], tags: [] },
  { name: 'category', intentWords: ['category', 'tag', 'genre', 'type'], classHints: ['category', 'tag', 'genre'], tags: [] },
  { name: 'rating', intentWords: ['rating', 'star', 'score', 'review'], classHints: ['rating', 'stars', 'score'], tags: [] },
  { name: 'location', intentWords: ['location', 'city', 'place', 'address'], classHints: ['location', 'city', 'address', 'place'], tags: [] },
  { name: 'company', intentWords: ['company', 'employer', 'organization', 'brand'], classHints: ['company', 'employer', 'org', 'brand'], tags: [] },
  { name: 'salary', intentWords: ['salary', 'pay', 'wage', 'compensation'], classHints: ['salary', 'pay', 'wage', 'compensation'], tags: [] }
];

const DEFAULT_ENTITIES = ['title', 'description', 'link'];

interface TreeNode {
  readonly tag: string;
  readonly id?: string;
  readonly classes: readonly string[];
  readonly children: TreeNode[];
  readonly order: number;
}

const SAFE_CLASS = /^-?[_a-zA-Z][\w-]*$/;

const classList = (attributes: Readonly<Record<string, string>>): string[] =>
  [...new Set((attributes.class ?? '').split(/\s+/).filter((name) => SAFE_CLASS.test(name)))].sort();

export const buildTree = (events: readonly StructureEvent[]): TreeNode => {
  const root: TreeNode = { tag: '#root', classes: [], children: [], order: -1 };
  const stack: { readonly id: number; readonly node: TreeNode }[] = [];
  let order = 0;

  for (const event of events) {
    if (event.kind === 'opaque') {
      continue;
    }
    if (event.kind === 'close') {
      for (let index = stack.length - 1; index >= 0; index -= 1) {
        if (stack[index]?.id === event.id) {
          stack.length = index;
          break;
        }
      }
      continue;
    }

    const id = event.attributes.id;
    const node: TreeNode = {
      tag: event.tag,
      ...(id && SAFE_CLASS.test(id) ? { id } : {}),
      classes: classList(event.attributes),
      children: [],
      order
    };
    order += 1;
    (stack.at(-1)?.node ?? root).children.push(node);
    if (event.kind === 'open') {
      stack.push({ id: event.id, node });
    }
  }
  return root;
};

export const signatureOf = (node: TreeNode): string =>
  [node.tag, ...node.classes.map((name) => `.${name}`)].join('');

const subtreeSize = (node: TreeNode): number =>
  node.children.reduce((total, child) => total + subtreeSize(child), 1);

const walk = function* (node: TreeNode): Generator<TreeNode> {
  yield node;
  for (const child of node.children) {
    yield* walk(child);
  }
};

interface RepeatedGroup {
  readonly parent: TreeNode;
  readonly signature: string;
  readonly items: readonly TreeNode[];
  readonly weight: number;
}

/** The sibling signature repeated most often, then the heaviest, then the earliest. */
export const findRepeatedGroup = (root: TreeNode): RepeatedGroup | undefined => {
  let best: RepeatedGroup | undefined;
  for (const parent of walk(root)) {
    const bySignature = new Map<string, TreeNode[]>();
    for (const child of parent.children) {
      const signature = signatureOf(child);
      bySignature.set(signature, [...(bySignature.get(signature) ?? []), child]);
    }
    for (const [signature, items] of bySignature) {
      if (items.length < 2) {
        continue;
      }
      const weight = items.reduce((total, item) => total + subtreeSize(item), 0);
      if (!best || items.length > best.items.length || (items.length === best.items.length && weight > best.weight)) {
        best = { parent, signature, items, weight };
      }
    }
  }
  return best;
};

const containerSelectorFor = (parent: TreeNode): string => {
  if (parent.tag === '#root' || parent.tag === 'body') {
    return 'body';
  }
  if (parent.id) {
    return `${parent.tag}#${parent.id}`;
  }
  return signatureOf(parent);
};

const intentWords = (intent: string): Set<string> => {
  const words = new Set<string>();
  for (const word of intent.toLowerCase().match(/[a-z]+/g) ?? []) {
    words.add(word);
    if (word.endsWith('ies')) {
      words.add(`${word.slice(0, -3)}y`);
    } else if (word.endsWith('s')) {
      words.add(word.slice(0, -1));
    }
  }
  return words;
};

export const entitiesForIntent = (intent: string): readonly EntityRule[] => {
  const words = intentWords(intent);
  const matched = ENTITY_RULES.filter((rule) => rule.intentWords.some((word) => words.has(word)));
  return matched.length > 0 ? matched : ENTITY_RULES.filter((rule) => DEFAULT_ENTITIES.includes(rule.name));
};

interface DescendantSignature {
  readonly signature: string;
  readonly node: TreeNode;
  readonly itemCount: number;
}

const descendantSignatures = (items: readonly TreeNode[]): DescendantSignature[] => {
  const seen = new Map<string, { node: TreeNode; items: Set<number> }>();
  items.forEach((item, index) => {
    for (const node of walk(item)) {
      if (node === item) {
        continue;
      }
      const signature = signatureOf(node);
      const entry = seen.get(signature) ?? { node, items: new Set<number>() };
      entry.items.add(index);
      seen.set(signature, entry);
    }
  });
  return [...seen.entries()]
    .map(([signature, entry]) => ({ signature, node: entry.node, itemCount: entry.items.size }))
    .sort((left, right) => right.itemCount - left.itemCount || left.node.order - right.node.order);
};

const pickSignature = (rule: EntityRule, candidates: readonly DescendantSignature[]): string | undefined => {
  const byClass = candidates.find((candidate) =>
    candidate.node.classes.some((name) => rule.classHints.some((hint) => name.toLowerCase().includes(hint)))
  );
  if (byClass) {
    return byClass.signature;
  }
  return candidates.find((candidate) => rule.tags.includes(candidate.node.tag))?.signature;
};

export interface StaticFallbackOptions {
  readonly html: HtmlCapability;
  readonly confidence: number;
  readonly logger?: Logger;
}

export interface StaticFallback {
  generate(sourceHtml: string, intent: string): Promise<ExtractionSchema>;
}

/**
 * Builds a best-effort schema from document structure alone: the most
 * repeated sibling group becomes the item list and intent keywords pick
 * descendants by class name or tag.
 */
export const createStaticFallback = (options: StaticFallbackOptions): StaticFallback => {
  const logger = options.logger ?? createSilentLogger();

  return {
    async generate(sourceHtml: string, intent: string): Promise<ExtractionSchema> {
      const group = findRepeatedGroup(buildTree(options.html.parseStructure(sourceHtml)));
      if (!group) {
        throw new SchemaGenerationError('No repeated element group found for a structural schema');
      }

      const containerSelector = containerSelectorFor(group.parent);
      const itemSelector =
        (group.items[0]?.classes.length ?? 0) > 0 ? group.signature : `${containerSelector} > ${group.signature}`;
      const candidates = descendantSignatures(group.items);

      const fields: Record<string, FieldSelector> = {};
      const used = new Set<string>();
      for (const rule of entitiesForIntent(intent)) {
        const signature = pickSignature(rule, candidates);
        if (!signature) {
          continue;
        }
        const selector = `${itemSelector} ${signature}`;
        if (used.has(selector) && !rule.attribute) {
          continue;
        }
        used.add(selector);
        fields[rule.name] = {
          primary: selector,
          fallbacks: [],
          confidence: options.confidence,
          demoted: [],
          ...(rule.attribute ? { attribute: rule.attribute } : {})
        };
      }
      if (Object.keys(fields).length === 0) {
        fields.text = { primary: itemSelector, fallbacks: [], confidence: options.confidence, demoted: [] };
      }

      const selectors = [containerSelector, itemSelector, ...Object.values(fields).map((field) => field.primary)];
      const counts = await Promise.all(
        selectors.map((selector) => options.html.resolve(sourceHtml, selector).then((matches) => matches.length))
      );
      const unresolved = selectors.filter((_, index) => (counts[index] ?? 0) === 0);
      if (unresolved.length > 0) {
        throw new SchemaGenerationError(`Structural selectors matched nothing: ${unresolved.join(', ')}`);
      }

      logger.info({ itemSelector, fields: Object.keys(fields) }, 'Built structural fallback schema');
      return ExtractionSchemaSchema.parse({
        containerSelector,
        itemSelector,
        fields,
        confidenceSummary: Object.fromEntries(Object.keys(fields).map((name) => [name, options.confidence])),
        strategy: 'static-heuristic',
        explanation: `Structural heuristic: ${group.items.length} repeated ${group.signature} elements`
      });
    }
  };
};
