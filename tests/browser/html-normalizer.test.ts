import { describe, it, expect } from 'vitest';
import { buildContentItem, normalizeHtml, truncateText } from '@prepscout/agents';

const PAGE = `<html>
<head>
  <title>  Python   Interview Questions </title>
  <style>p { color: red; }</style>
</head>
<body>
  <nav><ul><li>Home</li></ul></nav>
  <header><div>Site banner</div></header>
  <h1>Top questions</h1>
  <p>What is a decorator?</p>
  <script>window.x = 1;</script>
  <noscript><p>Enable JavaScript</p></noscript>
  <footer><p>Copyright</p></footer>
</body>
</html>`;

describe('normalizeHtml', () => {
  it('takes the title and strips page chrome from the body', () => {
    const { title, body } = normalizeHtml(PAGE);
    expect(title).toBe('Python Interview Questions');
    expect(body).toBe('Top questions What is a decorator?');
  });

  it('prefers a supplied title', () => {
    expect(normalizeHtml(PAGE, { title: 'Live Title' }).title).toBe('Live Title');
  });

  it('falls back to "No Title"', () => {
    expect(normalizeHtml('<body><p>Hello there</p></body>').title).toBe('No Title');
  });

  it('handles fragments without a body element', () => {
    const { title, body } = normalizeHtml('<title>T</title><p>Hello there</p>');
    expect(title).toBe('T');
    expect(body).toBe('Hello there');
  });

  it('caps the body at 5000 characters, or a lower limit', () => {
    const html = `<body><p>${'a'.repeat(6000)}</p></body>`;
    expect(normalizeHtml(html).body).toHaveLength(5000);
    expect(normalizeHtml(html, { bodyCharLimit: 100 }).body).toHaveLength(100);
    expect(normalizeHtml(html, { bodyCharLimit: 9000 }).body).toHaveLength(5000);
  });

  it('does not cut an emoji in half at the body limit', () => {
    expect(normalizeHtml('<body><p>ab😀cd</p></body>', { bodyCharLimit: 3 }).body).toBe('ab');
    expect(normalizeHtml('<body><p>ab😀cd</p></body>', { bodyCharLimit: 4 }).body).toBe('ab😀');
  });
});

describe('truncateText', () => {
  it('keeps text under the limit and drops a lone high surrogate at the cut', () => {
    expect(truncateText('héllo', 10)).toBe('héllo');
    expect(truncateText('x😀', 2)).toBe('x');
    expect(truncateText('abc', 0)).toBe('');
  });
});

describe('buildContentItem', () => {
  it('labels the source and stamps the fetch time', () => {
    const item = buildContentItem('https://leetcode.com/discuss/1', PAGE, {
      fetchedAt: new Date('2024-01-02T03:04:05.000Z'),
    });
    expect(item).toEqual({
      url: 'https://leetcode.com/discuss/1',
      title: 'Python Interview Questions',
      body: 'Top questions What is a decorator?',
      source: 'LeetCode',
      relevanceScore: 0,
      fetchedAt: '2024-01-02T03:04:05.000Z',
    });
  });
});
