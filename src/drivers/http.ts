import axios from 'axios';
import { formatProxyForAxios } from './proxy.js';
import { classifyError } from '../utils/errors.js';
import type { CheapRenderer, CheapRenderOptions, CheapRenderResult } from '../types/fetch.js';

/**
 * Cheap render backend: a plain GET with axios, no script execution.
 * Any HTTP status comes back to the caller; only transport errors throw.
 */
export class HttpRenderer implements CheapRenderer {
  async renderCheap(url: string, options: CheapRenderOptions): Promise<CheapRenderResult> {
    try {
      const response = await axios.get<string>(url, {
        timeout: options.timeoutMs,
        headers: {
          'User-Agent': options.userAgent,
          'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.5'
        },
        proxy: options.proxy ? formatProxyForAxios(options.proxy) : false,
        maxRedirects: 5,
        responseType: 'text',
        validateStatus: () => true
      });

      const finalUrl = response.request?.res?.responseUrl;
      return {
        html: typeof response.data === 'string' ? response.data : String(response.data),
        status: response.status,
        finalUrl: typeof finalUrl === 'string' ? finalUrl : url
      };
    } catch (error) {
      throw classifyError(error, 'cheap');
    }
  }
}
