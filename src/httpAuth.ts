/**
 * HTTP-based Librus Authentication and Transport
 * Pure HTTP requests - no browser needed!
 *
 * Login follows the portal's OAuth pages:
 * 1. GET /OAuth/Authorization → initial api.librus.pl session
 * 2. POST credentials to the same endpoint
 * 3. GET /OAuth/Authorization/2FA → redirects into Synergia, setting its cookies
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { env, LOGIN_ACTION, type LibrusConfig } from './config.js';
import { TransportFailedError } from './errors.js';
import { logger } from './logger.js';
import { CookieJar } from './utils/cookieJar.js';

export type HttpMethod = 'GET' | 'POST';
export type FormFields = Record<string, string | number>;

/**
 * What the resource scrapers need from a session.
 * Both methods log failures and resolve to null instead of throwing.
 */
export interface Transport {
  request(method: HttpMethod, pathOrUrl: string, form?: FormFields): Promise<CheerioAPI | null>;
  getFile(pathOrUrl: string): Promise<Buffer | null>;
}

export interface LibrusClientOptions {
  config?: LibrusConfig;
  cookies?: Record<string, string> | null;
  fetch?: typeof fetch;
}

interface Exchange {
  response: Response;
  url: string;
  /** Cookies set by any hop of this exchange */
  cookies: Record<string, string>;
}

const MAX_REDIRECTS = 10;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
// The only redirect target getFile will follow
const FILE_REDIRECT_MARKER = 'GetFile';

/**
 * Load an HTML string into a queryable document
 */
export function loadDocument(html: string): CheerioAPI {
  return cheerio.load(html);
}

function encodeForm(form: FormFields): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(form)) {
    params.append(key, String(value));
  }
  return params.toString();
}

export class LibrusClient implements Transport {
  private readonly config: LibrusConfig;
  private readonly jar: CookieJar;
  private readonly fetchImpl: typeof fetch;

  constructor(options: LibrusClientOptions = {}) {
    this.config = options.config ?? env;
    this.jar = new CookieJar(options.cookies, this.config.baseUrl);
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Resolve a portal path ("przegladaj_nb/uczen") against the base origin;
   * absolute URLs pass through
   */
  resolveUrl(pathOrUrl: string): string {
    return new URL(pathOrUrl, this.config.baseUrl).toString();
  }

  cookies(): Record<string, string> {
    return this.jar.toRecord();
  }

  /**
   * Authenticate with Librus using pure HTTP.
   * Returns the cookies set by the confirmation step, or null on any failure.
   */
  async authorize(login: string, password: string): Promise<Record<string, string> | null> {
    logger.info('Auth', `Authorizing ${login.substring(0, 3)}***`);

    try {
      logger.debug('Auth', 'Step 1: fetching authorization page');
      await this.exchange('GET', this.config.authUrl);

      logger.debug('Auth', 'Step 2: posting credentials');
      await this.exchange('POST', this.config.loginUrl, {
        action: LOGIN_ACTION,
        login,
        pass: password,
      });

      logger.debug('Auth', 'Step 3: fetching confirmation page');
      const confirmation = await this.exchange('GET', this.config.twoFaUrl);

      logger.debug('Auth', `Received ${Object.keys(confirmation.cookies).length} cookies`);
      return confirmation.cookies;
    } catch (err) {
      logger.exception('Auth', 'Error during authorization:', err);
      return null;
    }
  }

  /**
   * Make an authenticated request and parse the HTML response
   */
  async request(method: HttpMethod, pathOrUrl: string, form?: FormFields): Promise<CheerioAPI | null> {
    const url = this.resolveUrl(pathOrUrl);
    try {
      const { response } = await this.exchange(method, url, form);
      return loadDocument(await response.text());
    } catch (err) {
      logger.exception('HTTP', `${method} ${url} failed:`, err);
      return null;
    }
  }

  /**
   * Download a file. The first response must redirect to a GetFile URL;
   * any other answer yields null.
   */
  async getFile(pathOrUrl: string): Promise<Buffer | null> {
    const url = this.resolveUrl(pathOrUrl);
    try {
      const { response } = await this.send('GET', url, undefined, false);
      const location = response.headers.get('location');
      await response.body?.cancel();
      if (!location || !location.includes(FILE_REDIRECT_MARKER)) {
        logger.warn('HTTP', `No file redirect for ${url} (HTTP ${response.status})`);
        return null;
      }

      const file = await this.exchange('GET', new URL(location, url).toString());
      return Buffer.from(await file.response.arrayBuffer());
    } catch (err) {
      logger.exception('HTTP', `Download of ${url} failed:`, err);
      return null;
    }
  }

  /**
   * send() that rejects with TransportFailedError unless the final response is 2xx
   */
  private async exchange(method: HttpMethod, url: string, form?: FormFields): Promise<Exchange> {
    let result: Exchange;
    try {
      result = await this.send(method, url, form, true);
    } catch (err) {
      if (err instanceof TransportFailedError) throw err;
      logger.debug('HTTP', `Network error at ${url}: ${err instanceof Error ? err.message : String(err)}`);
      throw new TransportFailedError(url);
    }

    if (!result.response.ok) {
      await result.response.body?.cancel();
      logger.debug('HTTP', `HTTP Error ${result.response.status} at ${result.url}`);
      throw new TransportFailedError(result.url, result.response.status);
    }
    return result;
  }

  /**
   * One request, following redirects by hand so that cookies
   * set on every hop land in the jar
   */
  private async send(method: HttpMethod, url: string, form: FormFields | undefined, follow: boolean): Promise<Exchange> {
    const cookies: Record<string, string> = {};
    let currentUrl = url;
    let currentMethod = method;
    let body = form ? encodeForm(form) : undefined;

    for (let hop = 0; ; hop++) {
      logger.debug('HTTP', `${currentMethod} ${currentUrl}`);
      const response = await this.fetchImpl(currentUrl, {
        method: currentMethod,
        headers: this.headers(currentUrl, body !== undefined),
        body,
        redirect: 'manual',
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
      Object.assign(cookies, this.jar.ingest(response.headers, currentUrl));

      const location = response.headers.get('location');
      if (!follow || !location || !REDIRECT_STATUSES.has(response.status)) {
        return { response, url: currentUrl, cookies };
      }
      if (hop >= MAX_REDIRECTS) {
        throw new TransportFailedError(currentUrl, response.status);
      }

      // Redirect bodies are discarded
      await response.body?.cancel();
      currentUrl = new URL(location, currentUrl).toString();
      if (response.status !== 307 && response.status !== 308) {
        currentMethod = 'GET';
        body = undefined;
      }
    }
  }

  private headers(url: string, hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent,
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    };
    const cookie = this.jar.header(url);
    if (cookie) {
      headers['Cookie'] = cookie;
    }
    if (hasBody) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }
    return headers;
  }
}
