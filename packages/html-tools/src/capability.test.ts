import { describe, expect, it } from 'vitest';

import { createHtmlCapability } from './capability.js';

describe('createHtmlCapability', () => {
  const capability = createHtmlCapability();

  describe('parseStructure', () => {
    it('reports tag spans with explicit, void and implied closes', () => {
      const html = '<ul class="jobs"><li>A<br></li><li>B</ul>';
      const events = capability.parseStructure(html).map((event) =>
        event.kind === 'opaque' ? [event.kind, event.start, event.end] : [event.kind, event.tag, event.start, event.end]
      );

      expect(events).toEqual([
        ['open', 'ul', 0, 17],
        ['open', 'li', 17, 21],
        ['void', 'br', 22, 26],
        ['close', 'li', 26, 31],
        ['open', 'li', 31, 35],
        ['close', 'li', 36, 36],
        ['close', 'ul', 36, 41]
      ]);
    });

    it('keeps attributes and marks implied closes', () => {
      const events = capability.parseStructure('<ul class="jobs"><li>B</ul>');

      expect(events[0]).toMatchObject({ kind: 'open', tag: 'ul', attributes: { class: 'jobs' } });
      expect(events[2]).toMatchObject({ kind: 'close', tag: 'li', implied: true });
      expect(events[3]).toMatchObject({ kind: 'close', tag: 'ul', implied: false });
    });

    it('reports comments as opaque spans', () => {
      const events = capability.parseStructure('<div><!-- note --><p>x</p></div>');

      expect(events.map((event) => [event.kind, event.start])).toEqual([
        ['open', 0],
        ['opaque', 5],
        ['open', 18],
        ['close', 22],
        ['close', 26]
      ]);
    });
  });

  describe('resolve', () => {
    const html =
      '<ul class="jobs"><li class="job"><a href="/a">A</a></li><li class="job"><a href="/b">B</a></li></ul>';

    it('returns ordered matches with tags and attributes', async () => {
      const matches = await capability.resolve(html, '.job a');

      expect(matches).toEqual([
        { tag: 'a', attributes: { href: '/a' } },
        { tag: 'a', attributes: { href: '/b' } }
      ]);
    });

    it('keeps no per-call state across repeated resolves', async () => {
      const first = await capability.resolve(html, 'li.job');
      for (let index = 0; index < 50; index += 1) {
        await capability.resolve(index % 2 === 0 ? html : `${html}<p>${index}</p>`, 'li.job');
      }
      const last = await capability.resolve(html, 'li.job');

      expect(Object.keys(capability).sort()).toEqual(['parseStructure', 'resolve']);
      expect(last).toEqual(first);
    });

    it('returns an empty list when nothing matches', async () => {
      await expect(capability.resolve(html, '.salary')).resolves.toEqual([]);
    });

    it('rejects invalid selectors', async () => {
      await expect(capability.resolve(html, 'li[')).rejects.toThrow();
    });
  });
});
