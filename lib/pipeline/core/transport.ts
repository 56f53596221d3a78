/**
 * HTTP transport handed to the provider SDK.
 *
 * Every request goes through a dedicated undici Agent, so neither proxy
 * environment variables nor a process-wide dispatcher installed by the
 * host can reroute provider calls.
 */

import { Agent } from "undici";

export interface TransportConfig {
  /** Upper bound for waiting on response headers and between body chunks */
  readonly timeoutMs: number;
  readonly connectTimeoutMs: number;
}

export interface Transport {
  readonly config: TransportConfig;
  fetch: typeof globalThis.fetch;
  close(): Promise<void>;
}

export function createTransportConfig(options: {
  timeoutMs: number;
  connectTimeoutMs: number;
}): TransportConfig {
  return Object.freeze({
    timeoutMs: options.timeoutMs,
    connectTimeoutMs: options.connectTimeoutMs,
  });
}

export function createTransport(config: TransportConfig): Transport {
  const agent = new Agent({
    connect: { timeout: config.connectTimeoutMs },
    headersTimeout: config.timeoutMs,
    bodyTimeout: config.timeoutMs,
  });

  const proxyFreeFetch: typeof globalThis.fetch = (
    input: string | URL | Request,
    init?: RequestInit
  ): Promise<Response> =>
    globalThis.fetch(input, Object.assign({}, init, { dispatcher: agent }));

  return {
    config,
    fetch: proxyFreeFetch,
    close: () => agent.close(),
  };
}
