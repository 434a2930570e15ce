import { encode } from "base-64";
import { Auth, HttpTransport } from "../models";
import { DigestSession } from "./digestSession";

type AuthMode =
  | { type: "anonymous" }
  | { type: "basic"; header: string }
  | { type: "digest"; session: DigestSession };

/** Credentials go out as UTF-8 bytes. */
export function basicAuthHeader(username: string, password: string): string {
  const bytes = Buffer.from(`${username}:${password}`, "utf8");
  return `Basic ${encode(bytes.toString("latin1"))}`;
}

/**
 * Decorates outgoing requests according to the client's auth mode.
 */
export class Authenticator {
  private readonly mode: AuthMode;

  constructor(auth: Auth, transport: HttpTransport, logRequests = false) {
    this.mode = toMode(auth, transport, logRequests);
  }

  get digestSession(): DigestSession | null {
    return this.mode.type === "digest" ? this.mode.session : null;
  }

  /**
   * Returns the `Authorization` value for the request, or `undefined` for
   * anonymous access. In Digest mode this may probe the server first.
   */
  async authorization(
    method: string,
    url: URL,
    body?: string | Uint8Array
  ): Promise<string | undefined> {
    const mode = this.mode;
    switch (mode.type) {
      case "anonymous":
        return undefined;
      case "basic":
        return mode.header;
      case "digest":
        // check and probe are separate critical sections; concurrent first
        // requests may each probe, the last stored challenge wins
        if (!(await mode.session.isEstablished())) {
          await mode.session.probe(method, url.toString());
        }
        return mode.session.respond(method, url, body);
    }
  }
}

function toMode(
  auth: Auth,
  transport: HttpTransport,
  logRequests: boolean
): AuthMode {
  switch (auth.type) {
    case "anonymous":
      return { type: "anonymous" };
    case "basic":
      return {
        type: "basic",
        header: basicAuthHeader(auth.username, auth.password),
      };
    case "digest":
      return {
        type: "digest",
        session: new DigestSession(
          auth.username,
          auth.password,
          transport,
          logRequests
        ),
      };
  }
}
