import { HttpRequest, HttpResponse, HttpTransport } from "../src/models";

export type Responder = (
  request: HttpRequest
) => HttpResponse | Promise<HttpResponse>;

export const DIGEST_CHALLENGE =
  'Digest realm="example.com", qop="auth", nonce="dcd98b7102dd2f0e8b11d0f600bfb0c093", opaque="5ccc069c403ebaf9f0171e9517f40e41"';

export function reply(
  status: number,
  body = "",
  headers: Record<string, string> = {}
): HttpResponse {
  return { status, headers, data: Buffer.from(body, "utf8") };
}

/**
 * 401 + challenge for requests without credentials, `status` otherwise.
 */
export function digestServer(status = 200, body = ""): Responder {
  return (request) =>
    request.headers["Authorization"]
      ? reply(status, body)
      : reply(401, "", { "www-authenticate": DIGEST_CHALLENGE });
}

/**
 * In-process stand-in for the HTTP transport. Records every request and
 * answers through `respond`.
 */
export class FakeTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];

  constructor(public respond: Responder = () => reply(200)) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    return this.respond(request);
  }

  unauthenticated(): HttpRequest[] {
    return this.requests.filter((r) => !r.headers["Authorization"]);
  }
}
