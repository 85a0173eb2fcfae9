/**
 * HTTP Transport
 *
 * HTTP client interface and implementations for provider requests.
 */

import { TransportError } from "../error";

/**
 * HTTP request definition.
 */
export interface HttpRequest {
  method: "GET" | "POST";
  url: string;
  headers?: Record<string, string>;
  body?: string;
  timeout?: number;
}

/**
 * HTTP response definition.
 */
export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
}

/**
 * HTTP transport interface (for dependency injection).
 *
 * Implementations reject with TransportError on network-level failure and
 * resolve with the response for every HTTP status.
 */
export interface HttpTransport {
  /**
   * Send an HTTP request.
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Default fetch-based HTTP transport.
 */
export class FetchHttpTransport implements HttpTransport {
  private defaultTimeout: number;
  private maxResponseSize: number;

  constructor(options?: { timeout?: number; maxResponseSize?: number }) {
    this.defaultTimeout = options?.timeout ?? 30000;
    this.maxResponseSize = options?.maxResponseSize ?? 1048576; // 1MB
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const timeout = request.timeout ?? this.defaultTimeout;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        redirect: "manual",
      });

      if (response.status >= 300 && response.status < 400) {
        const location = response.headers.get("location");
        throw new TransportError(
          `Unexpected redirect to ${location}`,
          "UnexpectedRedirect",
          { status: response.status }
        );
      }

      const body = await this.readBody(response);

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        statusText: response.statusText,
        headers,
        body,
      };
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }

      if (error instanceof Error) {
        if (error.name === "AbortError") {
          throw new TransportError(`Request timeout after ${timeout}ms`, "Timeout");
        }

        const cause = error.cause instanceof Error ? error.cause.message : "";
        const message = `${error.message} ${cause}`.toLowerCase();
        if (message.includes("enotfound") || message.includes("dns")) {
          throw new TransportError(`DNS resolution failed: ${error.message}`, "DnsResolutionFailed");
        }
        if (message.includes("econnrefused") || message.includes("econnreset")) {
          throw new TransportError(`Connection failed: ${error.message}`, "ConnectionFailed");
        }
        if (message.includes("certificate") || message.includes("ssl")) {
          throw new TransportError(`TLS error: ${error.message}`, "TlsError");
        }

        throw new TransportError(error.message, "ConnectionFailed");
      }

      throw new TransportError(String(error), "ConnectionFailed");
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async readBody(response: Response): Promise<string> {
    const contentLength = response.headers.get("content-length");
    if (contentLength && parseInt(contentLength, 10) > this.maxResponseSize) {
      throw new TransportError(
        `Response too large: ${contentLength} bytes`,
        "ResponseTooLarge",
        { status: response.status }
      );
    }

    const reader = response.body?.getReader();
    if (!reader) {
      return "";
    }

    const chunks: Uint8Array[] = [];
    let totalSize = 0;

    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      totalSize += value.length;
      if (totalSize > this.maxResponseSize) {
        await reader.cancel();
        throw new TransportError(
          `Response too large: ${totalSize} bytes`,
          "ResponseTooLarge",
          { status: response.status }
        );
      }

      chunks.push(value);
    }

    return Buffer.concat(chunks).toString("utf8");
  }
}

/**
 * Mock HTTP transport for testing.
 */
export class MockHttpTransport implements HttpTransport {
  private responses: Array<HttpResponse | Error> = [];
  private requestHistory: HttpRequest[] = [];

  /**
   * Queue a response to return.
   */
  queueResponse(response: HttpResponse): this {
    this.responses.push(response);
    return this;
  }

  /**
   * Queue a JSON response.
   */
  queueJsonResponse(status: number, body: unknown): this {
    return this.queueResponse({
      status,
      statusText: status === 200 ? "OK" : "Error",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  /**
   * Queue a raw text response.
   */
  queueTextResponse(status: number, body: string): this {
    return this.queueResponse({
      status,
      statusText: status === 200 ? "OK" : "Error",
      headers: { "content-type": "text/plain" },
      body,
    });
  }

  /**
   * Queue a failure the next send rejects with.
   */
  queueFailure(error: Error): this {
    this.responses.push(error);
    return this;
  }

  /**
   * Get request history.
   */
  getRequests(): HttpRequest[] {
    return [...this.requestHistory];
  }

  /**
   * Get last request.
   */
  getLastRequest(): HttpRequest | undefined {
    return this.requestHistory[this.requestHistory.length - 1];
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requestHistory.push(request);

    const next = this.responses.shift();
    if (!next) {
      throw new Error("No mock response available");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}
