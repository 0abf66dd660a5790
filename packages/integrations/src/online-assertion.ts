import { MonitorAssertion } from '@vigil/monitor-engine';
import { Logger, describeError } from '@vigil/shared';

import { FetchLike, HttpMethod } from './http.js';

const HTTP_STATUS_OK = 200;
const HTTP_STATUS_BAD_GATEWAY = 502;

export interface OnlineAssertionOptions {
  method?: HttpMethod;
  /** Treat 502 Bad Gateway as online, e.g. behind a proxy that is being redeployed. */
  ignore502?: boolean;
  fetch?: FetchLike;
  logger?: Logger;
}

/** Builds an assertion that passes when `url` answers 200 to `method` (GET by default). */
export function assertOnline(url: string, options: OnlineAssertionOptions = {}): MonitorAssertion {
  const method = options.method ?? 'GET';
  const ignore502 = options.ignore502 ?? false;
  const fetchImpl = options.fetch ?? fetch;

  return async (context) => {
    let status: number;
    try {
      const response = await fetchImpl(url, { method });
      status = response.status;
    } catch (error) {
      options.logger?.error('online check request failed', {
        monitor: context.monitor,
        url,
        method,
        error: describeError(error),
      });
      return false;
    }

    if (status !== HTTP_STATUS_OK) {
      options.logger?.error(`${url} returned status code ${status}`, {
        monitor: context.monitor,
        method,
      });
    }

    return status === HTTP_STATUS_OK || (ignore502 && status === HTTP_STATUS_BAD_GATEWAY);
  };
}
