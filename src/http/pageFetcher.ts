/**
 * Page Fetcher Module
 *
 * Retrieves pages from the league site one at a time, pausing between
 * requests as a courtesy to the upstream server.
 */

import { load, type CheerioAPI } from 'cheerio';
import type { RunConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import { FetchError } from '../errors/index.js';
import { httpGetBinary, httpGetText } from '../util/http.js';
import { RequestPacer } from '../util/requestPacer.js';

export interface PageFetcher {
  /**
   * Fetches and parses an HTML page
   *
   * @throws FetchError when the page cannot be retrieved
   */
  fetchDocument(url: string): Promise<CheerioAPI>;

  /**
   * Fetches a binary resource (the schedule workbook)
   *
   * @throws FetchError when the resource cannot be retrieved
   */
  fetchBinary(url: string): Promise<Buffer>;
}

export class HttpPageFetcher implements PageFetcher {
  private readonly pacer: RequestPacer;

  constructor(private readonly config: Pick<RunConfig, 'http'>, private readonly logger: Logger) {
    this.pacer = new RequestPacer(config.http.requestDelayMs);
  }

  async fetchDocument(url: string): Promise<CheerioAPI> {
    const res = await this.pacer.run(() => httpGetText(url, { timeoutMs: this.config.http.requestTimeoutMs }));
    this.logger.debug({ url, status: res.status }, 'page fetched');
    if (typeof res.data !== 'string' || res.data.length === 0) {
      throw new FetchError('Empty page body', url, res.status);
    }
    return load(res.data);
  }

  async fetchBinary(url: string): Promise<Buffer> {
    const res = await this.pacer.run(() => httpGetBinary(url, { timeoutMs: this.config.http.workbookTimeoutMs }));
    this.logger.debug({ url, status: res.status, bytes: res.data.length }, 'resource fetched');
    return res.data;
  }
}
