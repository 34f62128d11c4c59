import { Parser } from 'htmlparser2';

export interface PageLink {
  href: string;
  text: string;
}

export interface ParsedHtml {
  text: string[];
  links: PageLink[];
}

const RAW_TEXT_TAGS = new Set(['script', 'style']);

export function resolveHref(baseUrl: string, href: string): string | null {
  return URL.canParse(href, baseUrl) ? new URL(href, baseUrl).href : null;
}

/**
 * Streams the markup through htmlparser2's tokenizer callbacks and collects
 * visible text chunks plus anchors, without building a document tree.
 *
 * Each run of character data between two tags becomes one trimmed text
 * entry. Anchor text is the space-joined chunks seen between `<a>` and
 * `</a>`. Anchors without an href, whose href does not resolve against
 * `baseUrl`, or that are never explicitly closed, are dropped.
 */
export function parseHtml(baseUrl: string, markup: string): ParsedHtml {
  const text: string[] = [];
  const links: PageLink[] = [];

  let rawTextDepth = 0;
  let pending = '';
  let anchor: { href: string; chunks: string[] } | null = null;

  const flush = (): void => {
    const chunk = pending.trim();
    pending = '';
    if (!chunk) return;
    text.push(chunk);
    anchor?.chunks.push(chunk);
  };

  const closeAnchor = (): void => {
    if (anchor?.href) {
      const href = resolveHref(baseUrl, anchor.href);
      if (href) links.push({ href, text: anchor.chunks.join(' ') });
    }
    anchor = null;
  };

  const parser = new Parser({
    onopentag(name, attribs) {
      flush();
      if (RAW_TEXT_TAGS.has(name)) rawTextDepth++;
      if (name === 'a') {
        anchor = attribs.href === undefined ? null : { href: attribs.href, chunks: [] };
      }
    },
    ontext(data) {
      if (rawTextDepth === 0) pending += data;
    },
    onclosetag(name, isImplied) {
      flush();
      if (RAW_TEXT_TAGS.has(name)) rawTextDepth = Math.max(0, rawTextDepth - 1);
      if (name !== 'a') return;
      // only an explicit </a> emits a link; implied closes drop the anchor
      if (isImplied) anchor = null;
      else closeAnchor();
    },
    oncomment() {
      flush();
    },
    onprocessinginstruction() {
      flush();
    },
  });

  parser.write(markup);
  parser.end();
  flush();

  return { text, links };
}
