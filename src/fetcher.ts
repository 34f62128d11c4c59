import type { CrawlContext } from './context.js';
import { FetchError } from './errors.js';

const ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';

function isHtmlResponse(url: string, contentType: string): boolean {
  return (
    contentType.includes('text/html') ||
    contentType.includes('application/xhtml') ||
    url.endsWith('.html')
  );
}

/**
 * Single GET with the context's timeout. No retries.
 * Throws FetchError for a non-200 status, a non-HTML content type, an empty
 * body or a transport failure.
 */
export async function fetchPage(url: string, context: CrawlContext): Promise<string> {
  context.logger.info(`GET ${url}`);

  let res: Response;
  try {
    res = await fetch(url, {
      signal: AbortSignal.timeout(context.timeoutMs),
      headers: {
        'User-Agent': context.userAgent,
        'Accept': ACCEPT,
      },
    });
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new FetchError(url, 'network', `HTTP error for ${url}: ${detail}`, { cause: err });
  }

  if (res.status !== 200) {
    await res.body?.cancel();
    throw new FetchError(url, 'status', `Non-200 status ${res.status} for ${url}`, {
      status: res.status,
    });
  }

  const contentType = (res.headers.get('content-type') ?? '').toLowerCase();
  if (!isHtmlResponse(url, contentType)) {
    await res.body?.cancel();
    throw new FetchError(
      url,
      'content-type',
      `Skipping non-HTML content-type for ${url}: ${contentType}`,
      { status: res.status },
    );
  }

  let body: string;
  try {
    body = await res.text();
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new FetchError(url, 'network', `HTTP error for ${url}: ${detail}`, { cause: err });
  }

  if (body === '') {
    throw new FetchError(url, 'empty', `Empty response body for ${url}`, { status: res.status });
  }
  return body;
}

export function logFetchError(err: FetchError, context: CrawlContext): void {
  switch (err.reason) {
    case 'status':
    case 'empty':
      context.logger.warn(err.message);
      break;
    case 'content-type':
      context.logger.info(err.message);
      break;
    case 'network':
      context.logger.error(err.message);
      break;
  }
}
