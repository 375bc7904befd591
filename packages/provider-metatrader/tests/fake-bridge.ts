/**
 * @fileoverview In-process terminal bridge for connector tests.
 *
 * Routes requests through an axios adapter, so nothing leaves the process.
 */

import axios, {
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';

export interface BridgeCall {
  method: string;
  url: string;
  params: Record<string, unknown>;
  body: unknown;
}

export type BridgeHandler = (call: BridgeCall) => unknown;

export interface FakeBridge {
  http: AxiosInstance;
  calls: BridgeCall[];
  routes: Record<string, BridgeHandler>;
}

/** A terminal that accepts the session and answers every info call. */
export function healthyTerminalRoutes(): Record<string, BridgeHandler> {
  return {
    'POST /initialize': () => ({ ok: true }),
    'GET /account_info': () => ({ account_info: { login: 5001, server: 'Demo-Server' } }),
    'GET /terminal_info': () => ({ terminal_info: { connected: true, name: 'Test Terminal' } }),
    'GET /last_error': () => ({ code: -2, message: 'Invalid arguments' }),
    'POST /shutdown': () => ({ ok: true }),
  };
}

export function createFakeBridge(routes: Record<string, BridgeHandler>): FakeBridge {
  const calls: BridgeCall[] = [];

  const http = axios.create({
    baseURL: 'http://bridge.test',
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const call: BridgeCall = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        params: config.params ?? {},
        body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
      };
      calls.push(call);

      const handler = routes[`${call.method} ${call.url}`];
      if (!handler) {
        throw new Error(`connect ECONNREFUSED ${call.method} ${call.url}`);
      }

      return { data: handler(call), status: 200, statusText: 'OK', headers: {}, config };
    },
  });

  return { http, calls, routes };
}
