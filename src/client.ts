import { Authenticator } from "./auth/authenticate";
import { DecodeError, RequestError } from "./errors";
import {
  Auth,
  Depth,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  ListEntity,
  ResourceResponse,
  WebDAVOptions,
} from "./models";
import { AxiosTransport } from "./transport";
import {
  joinUrl,
  normalizeSlashEnd,
  normalizeSlashStart,
} from "./utils/common";
import {
  decodeMultiStatus,
  parseServerError,
  toListEntity,
} from "./utils/parser";

const OCTET_CT = "application/octet-stream";
const XML_CT = "application/xml; charset=utf-8";
const FORM_CT = "application/x-www-form-urlencoded";

export const PROPFIND_ALLPROP = `<?xml version="1.0" encoding="utf-8" ?>
<D:propfind xmlns:D="DAV:">
  <D:allprop/>
</D:propfind>`;

function depthHeader(depth: Depth): string {
  switch (depth.type) {
    case "number":
      return String(depth.value);
    case "infinity":
      return "infinity";
  }
}

export class WebDAVClient {
  private readonly transport: HttpTransport;
  private readonly authenticator: Authenticator;

  public readonly baseUrl: string;
  public readonly auth: Auth;

  private constructor(options: WebDAVOptions) {
    this.baseUrl = options.baseUrl;
    this.auth = options.auth ?? { type: "anonymous" };
    this.transport =
      options.transport ??
      new AxiosTransport({
        requestTimeout: options.requestTimeout,
        logRequests: options.logRequests,
        tls: options.tls,
        agent: options.agent,
      });
    this.authenticator = new Authenticator(
      this.auth,
      this.transport,
      options.logRequests
    );
  }

  /**
   * Creates a client. No request is sent until the first operation.
   * @throws DecodeError when `baseUrl` is missing, RequestError when it is
   * not a URL.
   * @example
   * ```typescript
   * const client = WebDAVClient.create({
   *   baseUrl: "https://dav.example.com/remote.php/dav/files/user",
   *   auth: { type: "digest", username: "user", password: "password" },
   * });
   * const entries = await client.list("/", { type: "number", value: 1 });
   * ```
   */
  static create(options: WebDAVOptions): WebDAVClient {
    if (!options.baseUrl) {
      throw new DecodeError({ type: "field-not-found", field: "host" });
    }
    try {
      new URL(options.baseUrl);
    } catch (error) {
      throw new RequestError(`Invalid base URL: ${options.baseUrl}`, error);
    }
    return new WebDAVClient(options);
  }

  /**
   * Forgets the stored Digest challenge so the next request probes again.
   * The client never does this by itself, even when the server answers 401.
   */
  public async resetDigestAuth(): Promise<void> {
    await this.authenticator.digestSession?.reset();
  }

  /*
   * Request building
   */

  /**
   * Joins `path` onto the base URL and applies authentication.
   */
  public async startRequest(
    method: string,
    path: string,
    body?: string | Uint8Array
  ): Promise<HttpRequest> {
    const raw = joinUrl(this.baseUrl, path);
    let url: URL;
    try {
      url = new URL(raw);
    } catch (error) {
      throw new RequestError(`Invalid request URL: ${raw}`, error);
    }

    const headers: Record<string, string> = {};
    const authorization = await this.authenticator.authorization(
      method,
      url,
      body
    );
    if (authorization !== undefined) headers["Authorization"] = authorization;

    return { method, url: url.toString(), headers, body };
  }

  private async send(
    method: string,
    path: string,
    headers: Record<string, string> = {},
    body?: string | Uint8Array
  ): Promise<HttpResponse> {
    const request = await this.startRequest(method, path, body);
    return this.transport.send({
      ...request,
      headers: { ...request.headers, ...headers },
    });
  }

  /** `Destination` header value: base URL path + `to`. */
  private destination(to: string): string {
    const basePath = new URL(this.baseUrl).pathname;
    return `${normalizeSlashEnd(basePath)}/${normalizeSlashStart(to)}`;
  }

  /**
   * Returns `res` when it is 2xx, otherwise throws the ServerError
   * decoded from its body.
   */
  private dav2xx(res: HttpResponse): HttpResponse {
    if (Math.floor(res.status / 100) === 2) return res;
    throw parseServerError(res.status, res.data.toString("utf8"));
  }

  /*
   * Raw operations, any status
   */

  public getRaw(path: string): Promise<HttpResponse> {
    return this.send("GET", path);
  }

  public putRaw(
    path: string,
    body: string | Uint8Array
  ): Promise<HttpResponse> {
    return this.send("PUT", path, { "Content-Type": OCTET_CT }, body);
  }

  public deleteRaw(path: string): Promise<HttpResponse> {
    return this.send("DELETE", path);
  }

  public mkcolRaw(path: string): Promise<HttpResponse> {
    return this.send("MKCOL", path);
  }

  public unzipRaw(path: string): Promise<HttpResponse> {
    return this.send(
      "POST",
      path,
      { "Content-Type": FORM_CT },
      new URLSearchParams({ method: "UNZIP" }).toString()
    );
  }

  public mvRaw(from: string, to: string): Promise<HttpResponse> {
    return this.send("MOVE", from, { Destination: this.destination(to) });
  }

  public cpRaw(
    from: string,
    to: string,
    overwrite: boolean
  ): Promise<HttpResponse> {
    return this.send("COPY", from, {
      Destination: this.destination(to),
      Overwrite: overwrite ? "T" : "F",
    });
  }

  public listRaw(path: string, depth: Depth): Promise<HttpResponse> {
    return this.send(
      "PROPFIND",
      path,
      { Depth: depthHeader(depth), "Content-Type": XML_CT },
      PROPFIND_ALLPROP
    );
  }

  /*
   * Checked operations
   */

  /**
   * Downloads a file.
   * @returns The response, its body in `data`.
   */
  public async get(path: string): Promise<HttpResponse> {
    return this.dav2xx(await this.getRaw(path));
  }

  /**
   * Uploads `body` to `path`, replacing what is there.
   */
  public async put(path: string, body: string | Uint8Array): Promise<void> {
    this.dav2xx(await this.putRaw(path, body));
  }

  /**
   * Deletes the file or collection at `path`.
   */
  public async delete(path: string): Promise<void> {
    this.dav2xx(await this.deleteRaw(path));
  }

  /**
   * Creates a collection.
   */
  public async mkcol(path: string): Promise<void> {
    this.dav2xx(await this.mkcolRaw(path));
  }

  /**
   * Asks the server to extract the zip archive at `path` in place.
   * Only servers implementing the UNZIP extension accept this.
   */
  public async unzip(path: string): Promise<void> {
    this.dav2xx(await this.unzipRaw(path));
  }

  /**
   * Moves or renames a resource. Both paths are relative to the base URL.
   */
  public async mv(from: string, to: string): Promise<void> {
    this.dav2xx(await this.mvRaw(from, to));
  }

  /**
   * Copies a resource, overwriting the destination.
   */
  public async cp(from: string, to: string): Promise<void> {
    this.dav2xx(await this.cpRaw(from, to, true));
  }

  /**
   * Lists `path` and returns the raw per-resource records, every propstat
   * block included.
   * @throws DecodeError when the status is not 207 or the body does not decode.
   */
  public async listResponses(
    path: string,
    depth: Depth
  ): Promise<ResourceResponse[]> {
    const res = await this.listRaw(path, depth);
    if (res.status !== 207) {
      throw new DecodeError({
        type: "status-mismatched",
        responseCode: res.status,
        expectedCode: 207,
      });
    }
    return decodeMultiStatus(res.data.toString("utf8")).responses;
  }

  /**
   * Lists files and folders at `path`.
   *
   * Depth 0 covers the resource only, 1 its direct children, infinity the
   * whole subtree. Entries keep the server's order.
   */
  public async list(path: string, depth: Depth): Promise<ListEntity[]> {
    const responses = await this.listResponses(path, depth);
    return responses.map(toListEntity);
  }
}
