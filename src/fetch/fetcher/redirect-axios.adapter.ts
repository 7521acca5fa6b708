import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { Readable } from 'node:stream';
import { REDIRECT_STATUS_CODES } from '../../common/constants';
import { AppLogger } from '../../common/logger/app-logger.service';
import { TooManyRedirectsError } from './fetch-errors';

const logger = AppLogger.create('RedirectAxiosAdapter');

function locationOf(response: AxiosResponse): string | undefined {
  const location: unknown = response.headers['location'];
  return typeof location === 'string' && location.length > 0 ? location : undefined;
}

// Frees the socket held by a redirect response that is not read
function discardBody(response: AxiosResponse): void {
  const data: unknown = response.data;
  if (data instanceof Readable) {
    data.destroy();
  }
}

/**
 * Follows redirects itself on top of `baseAdapter` instead of delegating to
 * follow-redirects, so the caller's abort signal covers every hop and an
 * exhausted redirect budget surfaces as TooManyRedirectsError.
 */
export function createRedirectAxiosAdapter(
  baseAdapter: AxiosAdapter,
  maxRedirects: number,
): AxiosAdapter {
  return async function redirectAxiosAdapter(
    config: InternalAxiosRequestConfig,
  ): Promise<AxiosResponse> {
    if (!config.url) {
      return baseAdapter(config);
    }

    let currentUrl = config.baseURL
      ? new URL(config.url, config.baseURL).toString()
      : config.url;
    let redirectCount = 0;
    let currentConfig: InternalAxiosRequestConfig = {
      ...config,
      url: currentUrl,
      baseURL: undefined,
      maxRedirects: 0,
      validateStatus: () => true,
    };

    while (true) {
      const response = await baseAdapter(currentConfig);
      const location = locationOf(response);

      if (!REDIRECT_STATUS_CODES.includes(response.status) || !location) {
        return response;
      }

      discardBody(response);
      redirectCount++;
      if (redirectCount > maxRedirects) {
        logger.warn('Maximum redirects exceeded', {
          event: 'http_max_redirects',
          url: currentUrl,
          maxRedirects,
        });
        throw new TooManyRedirectsError(maxRedirects);
      }

      const redirectUrl = new URL(location, currentUrl).toString();

      logger.debug('Following redirect', {
        event: 'http_redirect',
        fromUrl: currentUrl,
        toUrl: redirectUrl,
        redirectCount,
        statusCode: response.status,
      });

      currentUrl = redirectUrl;
      currentConfig = {
        ...currentConfig,
        url: redirectUrl,
        method: response.status === 303 ? 'get' : currentConfig.method,
      };
    }
  };
}
