import { describe, it, expect } from 'vitest';
import { parseHtml, resolveHref } from '../src/parser.js';

describe('parseHtml links', () => {
  it('resolves a root-relative href against the base URL', () => {
    const { links } = parseHtml('https://h/', "<a href='/x'>Go</a>");
    expect(links).toEqual([{ href: 'https://h/x', text: 'Go' }]);
  });

  it('resolves a document-relative href against the page directory', () => {
    const { links } = parseHtml('https://h/dir/page.html', '<a href="paper.pdf">PDF</a>');
    expect(links).toEqual([{ href: 'https://h/dir/paper.pdf', text: 'PDF' }]);
  });

  it('keeps absolute off-site links as they are', () => {
    const { links } = parseHtml('https://h/', '<a href="https://other.org/x">Other</a>');
    expect(links).toEqual([{ href: 'https://other.org/x', text: 'Other' }]);
  });

  it('joins the text chunks inside an anchor with single spaces', () => {
    const { links } = parseHtml('https://h/', '<a href="/p">  Paper <em>PDF</em> </a>');
    expect(links).toEqual([{ href: 'https://h/p', text: 'Paper PDF' }]);
  });

  it('gives an empty anchor text when the anchor holds no text', () => {
    const { links } = parseHtml('https://h/', '<a href="/img"><img src="x.png"></a>');
    expect(links).toEqual([{ href: 'https://h/img', text: '' }]);
  });

  it('skips anchors with a missing or empty href', () => {
    const { links } = parseHtml('https://h/', '<a name="top">Top</a><a href="">Empty</a>');
    expect(links).toEqual([]);
  });

  it('skips hrefs that cannot be resolved', () => {
    const { links } = parseHtml('https://h/', '<a href="http://[bad">Broken</a><a href="/ok">Ok</a>');
    expect(links).toEqual([{ href: 'https://h/ok', text: 'Ok' }]);
  });

  it('keeps links in document order', () => {
    const html = '<a href="/one">1</a><p>middle</p><a href="/two">2</a>';
    const { links } = parseHtml('https://h/', html);
    expect(links.map(l => l.href)).toEqual(['https://h/one', 'https://h/two']);
  });
});

describe('parseHtml text', () => {
  it('emits one trimmed line per run of character data', () => {
    const { text } = parseHtml('https://h/', '<h1> Title </h1><p>First <b>bold</b> end</p>');
    expect(text).toEqual(['Title', 'First', 'bold', 'end']);
  });

  it('includes anchor text in the page text', () => {
    const { text } = parseHtml('https://h/', '<p>See</p><a href="/x">Go</a>');
    expect(text).toEqual(['See', 'Go']);
  });

  it('drops script and style contents', () => {
    const html = '<p>Hi</p><script>var x = "<p>no</p>";</script><style>p { color: red; }</style><p>There</p>';
    const { text } = parseHtml('https://h/', html);
    expect(text).toEqual(['Hi', 'There']);
  });

  it('decodes entities without splitting the surrounding text', () => {
    const { text } = parseHtml('https://h/', '<p>Tom &amp; Jerry</p>');
    expect(text).toEqual(['Tom & Jerry']);
  });

  it('treats a comment as a chunk boundary', () => {
    const { text } = parseHtml('https://h/', '<p>before<!-- note -->after</p>');
    expect(text).toEqual(['before', 'after']);
  });

  it('captures text outside any element', () => {
    expect(parseHtml('https://h/', 'just text').text).toEqual(['just text']);
  });
});

describe('parseHtml malformed input', () => {
  it('returns empty results for empty markup', () => {
    expect(parseHtml('https://h/', '')).toEqual({ text: [], links: [] });
  });

  it('emits no link for an anchor left open at the end of input', () => {
    const { text, links } = parseHtml('https://h/', '<p>See</p><a href="/x">dangling');
    expect(links).toEqual([]);
    expect(text).toEqual(['See', 'dangling']);
  });

  it('does not throw on broken markup', () => {
    const html = '<div><a href="/a">unclosed <p>text</div></span>><<<';
    expect(() => parseHtml('https://h/', html)).not.toThrow();
  });
});

describe('resolveHref', () => {
  it('returns null for an unparsable href', () => {
    expect(resolveHref('https://h/', 'http://[bad')).toBeNull();
  });

  it('resolves parent-directory references', () => {
    expect(resolveHref('https://h/a/b/c.html', '../d')).toBe('https://h/a/d');
  });
});
