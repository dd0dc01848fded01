import { brotliDecompressSync } from 'node:zlib';

import type { PkgCacheConfig } from '../../utils/config.js';
import { createChildLogger } from '../../utils/logger.js';
import { describeError } from '../shared/errors.js';
import type { IndexDocument, IndexVariant } from '../types/packageIndex.js';
import { DecodeError, FetchError } from './errors.js';
import { parseIndexText } from './indexDocument.js';

const logger = createChildLogger({ service: 'IndexFetcher' });

export interface IndexFetcherDependencies {
  fetch: typeof fetch;
}

/**
 * Downloads compressed index documents and decodes them.
 */
export class IndexFetcher {
  private readonly deps: IndexFetcherDependencies;

  constructor(
    private readonly config: Pick<PkgCacheConfig, 'requestTimeoutMs'>,
    deps?: Partial<IndexFetcherDependencies>,
  ) {
    this.deps = {
      fetch: globalThis.fetch,
      ...deps,
    };
  }

  async fetchIndex(url: string, variant: IndexVariant): Promise<IndexDocument> {
    const text = await this.fetchText(url);
    const document = parseIndexText(text, variant);
    logger.info({ url, variant, packages: document.packages.size }, 'Decoded index document');
    return document;
  }

  /**
   * GET a document with compression negotiated. A `.br` file served without a
   * `Content-Encoding` header arrives still compressed and is decoded here.
   */
  async fetchText(url: string): Promise<string> {
    logger.debug({ url }, 'Downloading document');

    let response: Response;
    try {
      response = await this.deps.fetch(url, {
        headers: { 'Accept-Encoding': 'br, gzip, deflate' },
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
    } catch (error) {
      throw new FetchError(`Failed to download ${url}: ${describeError(error)}`, url);
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new FetchError(
        `Download of ${url} returned HTTP ${response.status}`,
        url,
        response.status,
      );
    }

    let body: Buffer;
    try {
      body = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw new FetchError(`Failed to read response body of ${url}: ${describeError(error)}`, url);
    }

    const alreadyDecoded = response.headers.has('content-encoding');
    if (!alreadyDecoded && new URL(url).pathname.endsWith('.br')) {
      try {
        body = brotliDecompressSync(body);
      } catch (error) {
        throw new DecodeError(`Body of ${url} is not valid brotli data`, describeError(error));
      }
    }

    logger.debug({ url, bytes: body.length }, 'Download complete');
    return body.toString('utf8');
  }
}
