import { describe, expect, it } from 'vitest';

import { InputError } from '@strata/core';

import { createHtmlCleaner } from './cleaner.js';

describe('createHtmlCleaner', () => {
  const cleaner = createHtmlCleaner();

  it('removes noise elements, comments and noisy attributes', () => {
    const raw = `<html><head><title>Jobs</title><script>var x = 1;</script></head>
<body>
  <nav>menu</nav>
  <!-- banner -->
  <ul class="jobs" style="color:red" data-track="1" data-testid="list">
    <li class="job" onclick="go()">Engineer</li>
  </ul>
  <footer>bye</footer>
</body></html>`;

    expect(cleaner.clean(raw)).toBe('<ul class="jobs" data-testid="list"><li class="job">Engineer</li></ul>');
  });

  it('honours a custom removal list', () => {
    const custom = createHtmlCleaner({ removeTags: ['aside'] });

    expect(custom.clean('<nav>menu</nav><aside>ad</aside>')).toBe('<nav>menu</nav>');
  });

  it('fails with an input error when nothing remains', () => {
    expect(() => cleaner.clean('   ')).toThrow(InputError);
    expect(() => cleaner.clean('<script>x()</script>')).toThrow('HTML document has no content after cleaning');
  });
});
