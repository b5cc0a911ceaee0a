import axios, { AxiosError, InternalAxiosRequestConfig } from "axios";
import { describe, it, expect } from "vitest";
import { createAxiosTransport } from "../src/transport";
import { NetworkError } from "../src/errors";

/**
 * An axios instance whose requests are answered in process.
 */
function createClient(requests: InternalAxiosRequestConfig[]) {
  return axios.create({
    adapter: async (config) => {
      requests.push(config);
      if (config.url === "https://registry.test/left-pad") {
        return {
          data: { name: "left-pad", versions: {} },
          status: 200,
          statusText: "OK",
          headers: {},
          config,
        };
      }
      if (config.url === "https://registry.test/left-pad.tgz") {
        return {
          data: Buffer.from([1, 2, 3]),
          status: 200,
          statusText: "OK",
          headers: {},
          config,
        };
      }
      if (config.url === "https://registry.test/offline") {
        throw new AxiosError("getaddrinfo ENOTFOUND registry.test", "ENOTFOUND", config);
      }
      throw new AxiosError(
        "Request failed with status code 404",
        AxiosError.ERR_BAD_REQUEST,
        config,
        undefined,
        { data: "", status: 404, statusText: "Not Found", headers: {}, config },
      );
    },
  });
}

describe("createAxiosTransport", () => {
  it("fetches JSON documents", async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const transport = createAxiosTransport({ client: createClient(requests) });

    expect(await transport.getJson("https://registry.test/left-pad")).toEqual({
      name: "left-pad",
      versions: {},
    });
  });

  it("fetches raw bytes as an arraybuffer", async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const transport = createAxiosTransport({ client: createClient(requests) });

    const bytes = await transport.getBytes("https://registry.test/left-pad.tgz");
    expect(Array.from(bytes)).toEqual([1, 2, 3]);
    expect(requests[0].responseType).toBe("arraybuffer");
  });

  it("passes the configured timeout to axios", async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const transport = createAxiosTransport({ client: createClient(requests), timeoutMs: 2500 });

    await transport.getJson("https://registry.test/left-pad");
    expect(requests[0].timeout).toBe(2500);
  });

  it("turns HTTP errors into NetworkError with the status", async () => {
    const transport = createAxiosTransport({ client: createClient([]) });

    const error = await transport.getBytes("https://registry.test/missing.tgz").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NetworkError);
    if (error instanceof NetworkError) {
      expect(error.status).toBe(404);
      expect(error.statusText).toBe("Not Found");
      expect(error.message).toBe(
        "Failed to fetch https://registry.test/missing.tgz: Request failed with status code 404",
      );
      expect(error.context).toEqual({ url: "https://registry.test/missing.tgz" });
    }
  });

  it("turns connection errors into NetworkError without a status", async () => {
    const transport = createAxiosTransport({ client: createClient([]) });

    const error = await transport.getJson("https://registry.test/offline").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NetworkError);
    if (error instanceof NetworkError) {
      expect(error.status).toBeUndefined();
      expect(error.message).toBe(
        "Failed to fetch https://registry.test/offline: getaddrinfo ENOTFOUND registry.test",
      );
    }
  });
});
