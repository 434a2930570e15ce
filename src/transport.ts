import axios, { AxiosInstance } from "axios";
import { readFileSync } from "fs";
import { Agent } from "https";
import { TransportError } from "./errors";
import { HttpRequest, HttpResponse, HttpTransport, TlsOptions } from "./models";

export interface AxiosTransportOptions {
  requestTimeout?: number;
  logRequests?: boolean;
  tls?: TlsOptions;
  agent?: AxiosInstance;
}

/**
 * Default transport. Every HTTP status resolves; only network failures
 * reject, as `TransportError`.
 */
export class AxiosTransport implements HttpTransport {
  private httpClient: AxiosInstance;
  private logRequests: boolean;

  /**
   * A caller-supplied `agent` may be shared by several transports, so
   * logging happens per `send` rather than through an interceptor on it.
   */
  constructor(options: AxiosTransportOptions = {}) {
    this.logRequests = options.logRequests ?? false;
    this.httpClient =
      options.agent ??
      axios.create({
        timeout: options.requestTimeout || 30000,
        httpsAgent: buildHttpsAgent(options.tls),
      });
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    if (this.logRequests) {
      console.log(`Request: ${request.method.toUpperCase()} ${request.url}`);
    }
    try {
      const res = await this.httpClient.request<ArrayBuffer>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: toRequestData(request.body),
        responseType: "arraybuffer",
        validateStatus: () => true,
      });
      return {
        status: res.status,
        headers: flattenHeaders(res.headers),
        data: Buffer.from(res.data),
      };
    } catch (error) {
      throw new TransportError(
        `${request.method} ${request.url} failed: ${error}`,
        request.method,
        request.url,
        error
      );
    }
  }
}

/**
 * axios sends a non-Buffer view as its whole backing `ArrayBuffer`; wrap
 * views in a Buffer over exactly their own bytes.
 */
function toRequestData(
  body: string | Uint8Array | undefined
): string | Buffer | undefined {
  if (body === undefined || typeof body === "string") return body;
  if (Buffer.isBuffer(body)) return body;
  return Buffer.from(body.buffer, body.byteOffset, body.byteLength);
}

function flattenHeaders(headers: object): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === "string") flat[key.toLowerCase()] = value;
    else if (typeof value === "number" || typeof value === "boolean")
      flat[key.toLowerCase()] = String(value);
    else if (Array.isArray(value)) flat[key.toLowerCase()] = value.join(", ");
  }
  return flat;
}

function buildHttpsAgent(tls?: TlsOptions): Agent | undefined {
  if (!tls) return undefined;
  const raw = tls.ca ?? (tls.caFile ? readFileSync(tls.caFile) : undefined);
  return new Agent({
    rejectUnauthorized: tls.rejectUnauthorized ?? true,
    ca: raw === undefined ? undefined : toPem(raw),
  });
}

/** Accepts PEM text or DER bytes and returns PEM. */
export function toPem(cert: string | Buffer): string {
  const text = typeof cert === "string" ? cert : cert.toString("latin1");
  if (text.toUpperCase().includes("-----BEGIN")) return text;

  const der = typeof cert === "string" ? Buffer.from(cert, "latin1") : cert;
  const lines = der.toString("base64").match(/.{1,64}/g) ?? [];
  return [
    "-----BEGIN CERTIFICATE-----",
    ...lines,
    "-----END CERTIFICATE-----",
    "",
  ].join("\n");
}
