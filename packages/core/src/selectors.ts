import { isTraversal, parse, SelectorType, stringify, type Selector } from 'css-what';

const POSITIONAL_PSEUDOS = new Set([
  'nth-child',
  'nth-last-child',
  'nth-of-type',
  'nth-last-of-type',
  'first-child',
  'last-child',
  'first-of-type',
  'last-of-type',
  'only-child',
  'only-of-type'
]);

const collapseWhitespace = (value: string): string => value.replace(/\s+/g, ' ').trim();

const parseGroups = (selector: string): Selector[][] | undefined => {
  try {
    return parse(selector);
  } catch {
    return undefined;
  }
};

const splitCompounds = (tokens: readonly Selector[]): Selector[][] => {
  const compounds: Selector[][] = [[]];
  for (const token of tokens) {
    if (isTraversal(token)) {
      compounds.push([]);
      continue;
    }
    compounds[compounds.length - 1].push(token);
  }
  return compounds.filter((compound) => compound.length > 0);
};

const tokenText = (token: Selector): string => {
  if (token.type === SelectorType.Tag) {
    return token.name.toLowerCase();
  }
  if (token.type === SelectorType.Universal) {
    return '*';
  }
  return stringify([[token]]);
};

const compoundTokens = (compound: readonly Selector[]): Set<string> =>
  new Set(compound.filter((token) => token.type !== SelectorType.Universal).map(tokenText));

const isSubset = (general: ReadonlySet<string>, specific: ReadonlySet<string>): boolean => {
  for (const token of general) {
    if (!specific.has(token)) {
      return false;
    }
  }
  return true;
};

/**
 * Re-serializes a selector from its parsed form so spacing and combinator
 * formatting no longer matter. Unparsable input is only whitespace-collapsed.
 */
export const normalizeSelector = (selector: string): string => {
  const groups = parseGroups(selector);
  return groups ? stringify(groups) : collapseWhitespace(selector);
};

export const isValidSelector = (selector: string): boolean => parseGroups(selector) !== undefined;

/**
 * True when every element matched by `specific` is also matched by `general`
 * under a descendant-only reading of combinators: the rightmost compound of
 * `general` is a subset of the rightmost compound of `specific`, and the
 * remaining compounds of `general` appear, in order, as subsets of ancestors
 * in `specific`. Selector lists only generalize each other when they are equal.
 */
export const generalizes = (general: string, specific: string): boolean => {
  const generalGroups = parseGroups(general);
  const specificGroups = parseGroups(specific);
  if (!generalGroups || !specificGroups || generalGroups.length !== 1 || specificGroups.length !== 1) {
    return normalizeSelector(general) === normalizeSelector(specific);
  }

  const generalCompounds = splitCompounds(generalGroups[0]).map(compoundTokens);
  const specificCompounds = splitCompounds(specificGroups[0]).map(compoundTokens);
  if (generalCompounds.length === 0 || specificCompounds.length === 0) {
    return false;
  }

  const generalSubject = generalCompounds[generalCompounds.length - 1];
  const specificSubject = specificCompounds[specificCompounds.length - 1];
  if (generalSubject.size === 0 || !isSubset(generalSubject, specificSubject)) {
    return false;
  }

  let cursor = specificCompounds.length - 2;
  for (let index = generalCompounds.length - 2; index >= 0; index -= 1) {
    while (cursor >= 0 && !isSubset(generalCompounds[index], specificCompounds[cursor])) {
      cursor -= 1;
    }
    if (cursor < 0) {
      return false;
    }
    cursor -= 1;
  }

  return true;
};

export const areRelatedSelectors = (left: string, right: string): boolean =>
  generalizes(left, right) || generalizes(right, left);

const compoundKey = (compound: readonly Selector[]): string => {
  const tokens = compound.filter(
    (token) =>
      token.type !== SelectorType.Universal &&
      !(token.type === SelectorType.Pseudo && POSITIONAL_PSEUDOS.has(token.name))
  );
  const tags = tokens.filter((token) => token.type === SelectorType.Tag).map(tokenText);
  const rest = tokens
    .filter((token) => token.type !== SelectorType.Tag)
    .map(tokenText)
    .sort();
  const key = [...tags, ...rest].join('');
  return key.length > 0 ? key : '*';
};

/**
 * Key shared by near-duplicate selectors: tag case, token order within a
 * compound, positional pseudo-classes and combinator kind are ignored.
 */
export const canonicalSelectorKey = (selector: string): string => {
  const groups = parseGroups(selector);
  if (!groups) {
    return collapseWhitespace(selector);
  }

  return groups
    .map((group) => splitCompounds(group).map(compoundKey).join(' '))
    .sort()
    .join(', ');
};

export const areNearDuplicates = (left: string, right: string): boolean =>
  canonicalSelectorKey(left) === canonicalSelectorKey(right);
