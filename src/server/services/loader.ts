import * as cheerio from 'cheerio';
import type { NormalizedDocument, RawInput } from '../../shared/api.js';
import { FetchError, InvalidInputError } from '../errors.js';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const BOILERPLATE = 'script, style, noscript, svg, iframe, nav, footer, header, aside, form';
const BLOCKS = 'p, div, li, section, article, main, h1, h2, h3, h4, h5, h6, blockquote, pre, tr, dt, dd';

export type LoaderOptions = {
  timeoutMs?: number;
  maxChars?: number;
  fetch?: typeof fetch;
};

/**
 * Trims, collapses horizontal whitespace and keeps at most one blank line
 * between paragraphs.
 */
export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[^\S\n]+/g, ' ')
    .split('\n')
    .map(line => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function extractHtmlText(html: string): string {
  const $ = cheerio.load(html);
  $(BOILERPLATE).remove();
  $('br').replaceWith('\n');
  $(BLOCKS).after('\n');

  let content = $('article').first();
  if (content.length === 0) content = $('main').first();
  if (content.length === 0) content = $('body');

  return normalizeWhitespace(content.text());
}

const MAX_REDIRECTS = 5;
const MAX_BODY_BYTES = 5_000_000;

const PRIVATE_HOSTS = [
  /^localhost$/,
  /\.localhost$/,
  /^0\./,
  /^10\./,
  /^127\./,
  /^169\.254\./,
  /^172\.(1[6-9]|2\d|3[01])\./,
  /^192\.168\./,
  /^\[::1?\]$/,
  /^\[::ffff:/,
  /^\[f[cd][0-9a-f]*:/,
  /^\[fe[89ab][0-9a-f]*:/,
];

/** Loopback, private and link-local hosts, judged on the URL's own hostname. */
export function isPrivateHost(url: URL): boolean {
  return PRIVATE_HOSTS.some(re => re.test(url.hostname));
}

export function parseUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    throw new InvalidInputError(`Malformed URL: ${raw}`, 'load');
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new InvalidInputError(`Only http(s) URLs can be analyzed, got ${url.protocol}`, 'load');
  }
  if (isPrivateHost(url)) {
    throw new InvalidInputError(`Private or local addresses cannot be analyzed: ${url.hostname}`, 'load');
  }
  return url;
}

const describeFailure = (e: unknown, timeoutMs: number) =>
  e instanceof Error && e.name === 'TimeoutError'
    ? `timed out after ${timeoutMs}ms`
    : e instanceof Error ? e.message : String(e);

const isRedirect = (res: Response) =>
  res.status >= 300 && res.status < 400 && res.headers.has('location');

function discardBody(res: Response) {
  res.body?.cancel().catch((e: unknown) => console.warn('Could not discard response body:', e));
}

export class ContentLoader {
  private readonly timeoutMs: number;
  private readonly maxChars: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: LoaderOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.maxChars = options.maxChars ?? 8000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async load(input: RawInput): Promise<NormalizedDocument> {
    if (input.kind === 'text') {
      const text = normalizeWhitespace(input.text);
      if (!text) throw new InvalidInputError('Text to analyze is empty', 'load');
      return { text: this.cap(text) };
    }

    const url = parseUrl(input.url);
    const text = await this.fetchText(url.toString());
    if (!text) throw new FetchError(`No readable content found at ${url}`, { url: url.toString() });

    return { text: this.cap(text), sourceUrl: url.toString() };
  }

  private async fetchText(url: string): Promise<string> {
    console.log(`Fetching: ${url}`);

    const signal = AbortSignal.timeout(this.timeoutMs);
    let target = url;
    let res = await this.request(target, url, signal);

    // Redirects are followed by hand so that every hop is checked against private hosts.
    for (let hops = 0; isRedirect(res); hops++) {
      discardBody(res);
      if (hops >= MAX_REDIRECTS) {
        throw new FetchError(`Failed to fetch ${url}: too many redirects`, { url, status: res.status });
      }
      const next = new URL(res.headers.get('location') ?? '', target);
      if ((next.protocol !== 'http:' && next.protocol !== 'https:') || isPrivateHost(next)) {
        throw new FetchError(`Failed to fetch ${url}: redirected to a disallowed address ${next.host}`, { url });
      }
      target = next.toString();
      res = await this.request(target, url, signal);
    }

    if (!res.ok) {
      discardBody(res);
      throw new FetchError(`Failed to fetch ${url}: HTTP ${res.status}`, { url, status: res.status });
    }

    const contentType = (res.headers.get('content-type') || 'text/html').toLowerCase();
    const isHtml = contentType.includes('html');
    if (!isHtml && !contentType.startsWith('text/')) {
      discardBody(res);
      throw new FetchError(`Unsupported content type "${contentType}" at ${url}`, { url, status: res.status });
    }

    const declaredLength = Number(res.headers.get('content-length'));
    if (declaredLength > MAX_BODY_BYTES) {
      discardBody(res);
      throw new FetchError(`Page at ${url} is too large (${declaredLength} bytes)`, { url, status: res.status });
    }

    let body: string;
    try {
      body = await res.text();
    } catch (e) {
      throw new FetchError(`Failed to fetch ${url}: ${describeFailure(e, this.timeoutMs)}`, { url });
    }

    if (isHtml) {
      const text = extractHtmlText(body);
      console.log(`Extracted ${url}: ${text.length} chars`);
      return text;
    }
    return normalizeWhitespace(body);
  }

  private async request(target: string, url: string, signal: AbortSignal): Promise<Response> {
    try {
      return await this.fetchImpl(target, {
        headers: { 'User-Agent': USER_AGENT, Accept: 'text/html,text/plain;q=0.9,*/*;q=0.5' },
        signal,
        redirect: 'manual',
      });
    } catch (e) {
      throw new FetchError(`Failed to fetch ${url}: ${describeFailure(e, this.timeoutMs)}`, { url });
    }
  }

  /** Cuts at `maxChars` UTF-16 units without splitting a surrogate pair. */
  private cap(text: string): string {
    if (text.length <= this.maxChars) return text;
    let end = this.maxChars;
    const last = text.charCodeAt(end - 1);
    if (last >= 0xd800 && last <= 0xdbff) end--;
    return text.slice(0, end).trimEnd();
  }
}
