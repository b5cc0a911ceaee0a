import axios, { AxiosInstance } from "axios";
import { NetworkError } from "./errors";

/**
 * Fetches raw resources over the network. The registry client and the
 * tarball installer only ever talk to the network through this.
 */
export interface Transport {
  getBytes(url: string): Promise<Uint8Array>;
  getJson(url: string): Promise<unknown>;
}

export interface AxiosTransportOptions {
  // Request timeout in milliseconds. 0 waits forever.
  timeoutMs?: number;
  // Pre-configured axios instance, e.g. one with a custom adapter.
  client?: AxiosInstance;
}

/**
 * Converts whatever axios threw into a NetworkError naming the URL, keeping
 * the HTTP status when the server responded.
 */
function toNetworkError(url: string, error: unknown): NetworkError {
  if (axios.isAxiosError(error)) {
    return new NetworkError(`Failed to fetch ${url}: ${error.message}`, {
      url,
      status: error.response?.status,
      statusText: error.response?.statusText,
      cause: error,
    });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new NetworkError(`Failed to fetch ${url}: ${reason}`, {
    url,
    cause: error,
  });
}

export function createAxiosTransport(
  options: AxiosTransportOptions = {},
): Transport {
  const client = options.client ?? axios.create();
  const timeout = options.timeoutMs ?? 0;

  return {
    async getBytes(url: string): Promise<Uint8Array> {
      try {
        const response = await client.get<ArrayBuffer>(url, {
          responseType: "arraybuffer",
          timeout,
        });
        return new Uint8Array(response.data);
      } catch (error) {
        throw toNetworkError(url, error);
      }
    },

    async getJson(url: string): Promise<unknown> {
      try {
        const response = await client.get<unknown>(url, {
          responseType: "json",
          timeout,
        });
        return response.data;
      } catch (error) {
        throw toNetworkError(url, error);
      }
    },
  };
}
