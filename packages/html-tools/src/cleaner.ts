import { load } from 'cheerio';
import { ElementType } from 'domelementtype';
import type { Element } from 'domhandler';

import { InputError, type Preprocessor } from '@strata/core';

export const DEFAULT_REMOVED_TAGS = [
  'script',
  'style',
  'noscript',
  'iframe',
  'svg',
  'head',
  'meta',
  'title',
  'link',
  'nav',
  'header',
  'footer'
] as const;

export const PRESERVED_DATA_ATTRIBUTES = ['data-testid', 'data-cy', 'data-test', 'data-id'] as const;

export interface HtmlCleanerOptions {
  readonly removeTags?: readonly string[];
  readonly preserveAttributes?: readonly string[];
}

const shouldDropAttribute = (name: string, preserved: ReadonlySet<string>): boolean => {
  const lowered = name.toLowerCase();
  if (preserved.has(lowered)) {
    return false;
  }
  return lowered === 'style' || lowered.startsWith('on') || lowered.startsWith('data-');
};

export const createHtmlCleaner = (options: HtmlCleanerOptions = {}): Preprocessor => {
  const removeTags = options.removeTags ?? DEFAULT_REMOVED_TAGS;
  const preserved = new Set<string>(options.preserveAttributes ?? PRESERVED_DATA_ATTRIBUTES);

  return {
    clean(rawHtml: string): string {
      if (!rawHtml.trim()) {
        throw new InputError('HTML document is empty');
      }

      const $ = load(rawHtml);
      if (removeTags.length > 0) {
        $(removeTags.join(', ')).remove();
      }

      $('*')
        .contents()
        .filter((_, node) => node.type === ElementType.Comment)
        .remove();

      $<Element, string>('*').each((_, element) => {
        for (const name of Object.keys(element.attribs)) {
          if (shouldDropAttribute(name, preserved)) {
            $(element).removeAttr(name);
          }
        }
      });

      const cleaned = ($('body').html() ?? '').replace(/>\s+</g, '><').trim();
      if (!cleaned) {
        throw new InputError('HTML document has no content after cleaning');
      }
      return cleaned;
    }
  };
};
