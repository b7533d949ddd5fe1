/**
 * @fileoverview `fetch` wrapper that aborts after a fixed timeout and reports
 * transport failures as AppErrors. The deadline covers the whole exchange:
 * the body is buffered before the timer is cleared.
 * @module src/utils/network/fetchWithTimeout
 */
import { AppError, ErrorCode } from '../../types-global/errors.js';
import { logger } from '../internal/logger.js';
import type { RequestContext } from '../internal/requestContext.js';

/** Statuses for which a `Response` may not carry a body. */
const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

const whenAborted = (signal: AbortSignal): Promise<never> =>
  new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), {
      once: true,
    });
  });

/**
 * Fetches `url` and reads its body within `timeoutMs`. The returned response
 * is fully buffered, so reading it again cannot stall.
 *
 * @param timeoutMs - Milliseconds before the request is aborted
 * @throws {AppError} Timeout when aborted, ServiceUnavailable on network failure
 */
export async function fetchWithTimeout(
  url: string,
  timeoutMs: number,
  context: RequestContext,
  options: RequestInit = {},
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const aborted = whenAborted(controller.signal);

  try {
    const response = await Promise.race([
      fetch(url, { ...options, signal: controller.signal }),
      aborted,
    ]);
    const body = await Promise.race([response.text(), aborted]);

    return new Response(NULL_BODY_STATUSES.has(response.status) ? null : body, {
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
    });
  } catch (error) {
    if (controller.signal.aborted) {
      logger.error(`[Network] Request timed out after ${timeoutMs}ms`, {
        ...context,
        url,
      });
      throw new AppError(
        ErrorCode.Timeout,
        `Request to ${url} timed out after ${timeoutMs}ms`,
        { url, timeoutMs },
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    logger.error(`[Network] Request failed: ${message}`, { ...context, url });
    throw new AppError(
      ErrorCode.ServiceUnavailable,
      `Network error while requesting ${url}: ${message}`,
      { url },
    );
  } finally {
    clearTimeout(timer);
  }
}
