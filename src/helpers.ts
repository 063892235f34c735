/**
 * Utility functions.
 */

import copy from 'fast-copy';
import type { SocketParams } from './types.ts';

/**
 * Append connection params to an endpoint URL as query parameters.
 *
 * Existing query parameters are kept; a param with the same name replaces
 * them. With no params the URL is returned unchanged.
 *
 * @param url - Endpoint URL, e.g. "ws://localhost:4000/socket/websocket"
 * @param params - Query parameters to append
 * @returns The URL to open
 */
export function endpointUrl(url: string, params: SocketParams): string {
  const entries = Object.entries(params);
  if (entries.length === 0) return url;

  const target = new URL(url);
  for (const [key, value] of entries) {
    target.searchParams.set(key, value);
  }
  return target.toString();
}

/**
 * Snapshot params so later mutation by the caller does not leak into reconnects.
 */
export function snapshotParams(params: SocketParams): SocketParams {
  return copy(params);
}

