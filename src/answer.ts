import type { Page } from './crawler.js';

export interface ScholarLink {
  sourceUrl: string;
  href: string;
  text: string;
}

export interface Publication {
  sourceUrl: string;
  line: string;
}

export interface PromptHandler {
  name: string;
  matches(prompt: string): boolean;
  answer(pages: readonly Page[]): string;
}

export const NO_SCHOLAR_LINK = 'No Google Scholar link found within crawled pages.';
export const NO_PUBLICATIONS = 'No publications detected via heuristics.';
export const UNRECOGNIZED_QUERY = 'Query not recognized; returning crawled page summaries:';

export const PUBLICATION_LIMIT = 20;
export const SUMMARY_PAGE_LIMIT = 8;
export const SNIPPET_LENGTH = 200;

const YEAR = /\b(19|20)\d{2}\b/;
const CITATION_PUNCTUATION = new Set([',', '.', ';', ':']);
const LINE_BREAK = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;

function pageLines(page: Page): string[] {
  return page.text
    .flatMap(chunk => chunk.split(LINE_BREAK))
    .map(line => line.trim())
    .filter(Boolean);
}

export function findScholarLink(pages: readonly Page[]): ScholarLink | null {
  for (const page of pages) {
    for (const { href, text } of page.links) {
      if (href.toLowerCase().includes('scholar.google') || text.toLowerCase().includes('google scholar')) {
        return { sourceUrl: page.url, href, text: text || 'Google Scholar' };
      }
    }
  }
  // Looser pass: any anchor that mentions scholar
  for (const page of pages) {
    for (const { href, text } of page.links) {
      if (text.toLowerCase().includes('scholar')) {
        return { sourceUrl: page.url, href, text };
      }
    }
  }
  return null;
}

// A year plus a couple of separators is usually an author/title/venue line.
export function isPublicationCandidate(line: string): boolean {
  if (!YEAR.test(line)) return false;
  let marks = 0;
  for (const ch of line) {
    if (CITATION_PUNCTUATION.has(ch)) marks++;
  }
  return marks >= 2;
}

export function extractPublications(pages: readonly Page[]): Publication[] {
  const found = new Map<string, Publication>();
  const add = (sourceUrl: string, line: string) => {
    if (!found.has(line)) found.set(line, { sourceUrl, line });
  };

  for (const page of pages) {
    const lines = pageLines(page);
    for (const line of lines) {
      if (isPublicationCandidate(line)) add(page.url, line);
    }
    // Listing pages: take every dated line, punctuation or not
    if (lines.some(line => line.toLowerCase().includes('publication'))) {
      for (const line of lines) {
        if (YEAR.test(line)) add(page.url, line);
      }
    }
  }

  return [...found.values()];
}

export function formatPublications(publications: readonly Publication[], limit = PUBLICATION_LIMIT): string {
  if (publications.length === 0) return NO_PUBLICATIONS;
  const lines = ['Publications (heuristic extraction):'];
  publications.slice(0, limit).forEach(({ sourceUrl, line }, i) => {
    lines.push(`${i + 1}. ${line}\n   Source: ${sourceUrl}`);
  });
  if (publications.length > limit) {
    lines.push(`(+${publications.length - limit} more omitted)`);
  }
  return lines.join('\n');
}

export function formatScholarLink(link: ScholarLink | null): string {
  if (!link) return NO_SCHOLAR_LINK;
  return [
    'Google Scholar link found:',
    `- Link: ${link.href}`,
    `- Anchor Text: ${link.text}`,
    `- Found on: ${link.sourceUrl}`,
  ].join('\n');
}

export function summarizePages(pages: readonly Page[]): string {
  const lines = [UNRECOGNIZED_QUERY];
  for (const page of pages.slice(0, SUMMARY_PAGE_LIMIT)) {
    const collapsed = page.text.join(' ').split(/\s+/).filter(Boolean).join(' ');
    // code points, so a surrogate pair is never cut in half
    const snippet = Array.from(collapsed).slice(0, SNIPPET_LENGTH).join('');
    lines.push(`- ${page.url}: ${snippet}...`);
  }
  return lines.join('\n');
}

const includesAny = (prompt: string, words: string[]) => words.some(word => prompt.includes(word));

/** Checked in order; the first handler whose `matches` accepts the prompt answers it. */
export const PROMPT_HANDLERS: readonly PromptHandler[] = [
  {
    name: 'scholar',
    matches: prompt => prompt.includes('scholar'),
    answer: pages => formatScholarLink(findScholarLink(pages)),
  },
  {
    name: 'publications',
    matches: prompt => includesAny(prompt, ['publication', 'paper', 'article']),
    answer: pages => formatPublications(extractPublications(pages)),
  },
];

/**
 * Answers `prompt` from already-crawled pages. Pure: never fetches, never
 * throws. Prompts no handler recognises get a per-page summary.
 */
export function answerPrompt(
  pages: readonly Page[],
  prompt: string,
  handlers: readonly PromptHandler[] = PROMPT_HANDLERS,
): string {
  const normalized = prompt.trim().toLowerCase();
  const handler = handlers.find(h => h.matches(normalized));
  return handler ? handler.answer(pages) : summarizePages(pages);
}
