import { AuthProbeError, MissingAuthContextError } from "../errors";
import { HttpTransport } from "../models";
import { getHeader } from "../utils/common";
import { DigestChallenge, parseDigestChallenge } from "../utils/digest";
import { Lock } from "../utils/lock";

/**
 * Digest state shared by every request of one client.
 *
 * Starts without a challenge. The first Digest request probes the server
 * (same method and URL, no credentials), stores the 401 challenge and from
 * then on every request reuses it with the next nonce-count. The stored
 * challenge is only read or replaced while holding `lock`; the probe
 * request itself runs outside it.
 */
export class DigestSession {
  private challenge: DigestChallenge | null = null;
  private readonly lock = new Lock();

  constructor(
    private readonly username: string,
    private readonly password: string,
    private readonly transport: HttpTransport,
    private readonly logRequests = false
  ) {}

  isEstablished(): Promise<boolean> {
    return this.lock.run(() => this.challenge !== null);
  }

  /**
   * Sends the unauthenticated request and stores the challenge from the
   * expected 401. Leaves the session untouched on any failure.
   */
  async probe(method: string, url: string): Promise<void> {
    if (this.logRequests) console.log(`Digest probe: ${method} ${url}`);

    const res = await this.transport.send({ method, url, headers: {} });
    if (res.status !== 401) {
      throw new AuthProbeError({
        type: "status-mismatched",
        responseCode: res.status,
        expectedCode: 401,
      });
    }

    const header = getHeader(res.headers, "www-authenticate");
    if (header === undefined) {
      throw new AuthProbeError({ type: "no-auth-header" });
    }
    await this.update(header);
  }

  /** Parses `header` and replaces the stored challenge with it. */
  async update(header: string): Promise<void> {
    const challenge = parseDigestChallenge(header);
    await this.lock.run(() => {
      this.challenge = challenge;
    });
    if (this.logRequests) {
      console.log(`Digest challenge stored for realm "${challenge.realm}"`);
    }
  }

  /**
   * Computes the `Authorization` value for `method` on `url`. Computing and
   * bumping the nonce-count happen in one critical section, so concurrent
   * callers never share an `nc`.
   */
  respond(
    method: string,
    url: URL,
    body?: string | Uint8Array
  ): Promise<string> {
    return this.lock.run(() => {
      if (!this.challenge) throw new MissingAuthContextError();
      return this.challenge.respond({
        username: this.username,
        password: this.password,
        uri: url.pathname,
        method,
        body,
      });
    });
  }

  /** The stored challenge, if any. */
  current(): Promise<DigestChallenge | null> {
    return this.lock.run(() => this.challenge);
  }

  /** Drops the stored challenge so the next request probes again. */
  reset(): Promise<void> {
    return this.lock.run(() => {
      this.challenge = null;
    });
  }
}
