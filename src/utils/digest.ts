import { createHash } from "crypto";
import { v4 as uuidv4 } from "uuid";
import { AuthComputeError, AuthProbeError } from "../errors";

export interface DigestContext {
  username: string;
  password: string;
  /** Request-URI as it appears on the request line (path only). */
  uri: string;
  method: string;
  /** Entity body, only hashed for qop=auth-int. */
  body?: string | Uint8Array;
  /** Fixed client nonce; a random one is generated when omitted. */
  cnonce?: string;
}

export interface DigestChallengeParams {
  realm: string;
  nonce: string;
  opaque?: string;
  qop: string[];
  algorithm: string;
  stale: boolean;
  domain?: string;
  charset?: string;
  userhash: boolean;
}

const HASHES: Record<string, string> = {
  MD5: "md5",
  "SHA-256": "sha256",
  "SHA-512-256": "sha512-256",
};

/**
 * A server-issued Digest challenge plus the nonce-count of the responses
 * computed against it.
 */
export class DigestChallenge implements DigestChallengeParams {
  readonly realm: string;
  readonly nonce: string;
  readonly opaque?: string;
  readonly qop: string[];
  readonly algorithm: string;
  readonly stale: boolean;
  readonly domain?: string;
  readonly charset?: string;
  readonly userhash: boolean;

  private nc = 0;

  constructor(params: DigestChallengeParams) {
    this.realm = params.realm;
    this.nonce = params.nonce;
    this.opaque = params.opaque;
    this.qop = params.qop;
    this.algorithm = params.algorithm;
    this.stale = params.stale;
    this.domain = params.domain;
    this.charset = params.charset;
    this.userhash = params.userhash;
  }

  get nonceCount(): number {
    return this.nc;
  }

  /**
   * Computes the `Authorization` header value for one request.
   * Every successful call consumes one nonce-count.
   */
  respond(context: DigestContext): string {
    const sess = /-sess$/i.test(this.algorithm);
    const base = this.algorithm.toUpperCase().replace(/-SESS$/, "");
    const hashName = HASHES[base];
    if (!hashName) {
      throw new AuthComputeError(
        `Unsupported digest algorithm "${this.algorithm}".`
      );
    }

    const qop = this.qop.includes("auth")
      ? "auth"
      : this.qop.includes("auth-int")
      ? "auth-int"
      : undefined;
    if (this.qop.length > 0 && !qop) {
      throw new AuthComputeError(
        `Unsupported digest qop "${this.qop.join(", ")}".`
      );
    }

    const h = (data: string | Uint8Array) =>
      createHash(hashName).update(data).digest("hex");

    this.nc += 1;
    const nc = this.nc.toString(16).padStart(8, "0");
    const cnonce = context.cnonce ?? uuidv4().replace(/-/g, "");

    let ha1 = h(`${context.username}:${this.realm}:${context.password}`);
    if (sess) ha1 = h(`${ha1}:${this.nonce}:${cnonce}`);

    const ha2 =
      qop === "auth-int"
        ? h(`${context.method}:${context.uri}:${h(context.body ?? "")}`)
        : h(`${context.method}:${context.uri}`);

    const response = qop
      ? h(`${ha1}:${this.nonce}:${nc}:${cnonce}:${qop}:${ha2}`)
      : h(`${ha1}:${this.nonce}:${ha2}`);

    const username = this.userhash
      ? h(`${context.username}:${this.realm}`)
      : context.username;

    const parts = [
      `username=${quote(username)}`,
      `realm=${quote(this.realm)}`,
      `nonce=${quote(this.nonce)}`,
      `uri=${quote(context.uri)}`,
    ];
    if (qop) {
      parts.push(`qop=${qop}`, `nc=${nc}`, `cnonce=${quote(cnonce)}`);
    }
    parts.push(`response=${quote(response)}`);
    if (this.opaque !== undefined) parts.push(`opaque=${quote(this.opaque)}`);
    parts.push(`algorithm=${this.algorithm}`);
    if (this.userhash) parts.push("userhash=true");

    return `Digest ${parts.join(", ")}`;
  }
}

/**
 * Parses a `WWW-Authenticate` header carrying a Digest challenge.
 * @throws AuthProbeError when the scheme is not Digest or realm/nonce are
 * missing.
 */
export function parseDigestChallenge(header: string): DigestChallenge {
  const match = /^\s*digest\s+(.*)$/is.exec(header);
  if (!match) {
    throw invalidChallenge(`not a Digest challenge: ${header}`);
  }

  const params = parseParams(match[1]);
  const realm = params.get("realm");
  const nonce = params.get("nonce");
  if (realm === undefined) throw invalidChallenge("missing realm");
  if (nonce === undefined) throw invalidChallenge("missing nonce");

  const qop = params.get("qop");
  return new DigestChallenge({
    realm,
    nonce,
    opaque: params.get("opaque"),
    qop: qop
      ? qop
          .split(",")
          .map((q) => q.trim().toLowerCase())
          .filter(Boolean)
      : [],
    algorithm: params.get("algorithm") || "MD5",
    stale: params.get("stale")?.toLowerCase() === "true",
    domain: params.get("domain"),
    charset: params.get("charset"),
    userhash: params.get("userhash")?.toLowerCase() === "true",
  });
}

function parseParams(input: string): Map<string, string> {
  const params = new Map<string, string>();
  let i = 0;

  while (i < input.length) {
    while (i < input.length && /[\s,]/.test(input[i])) i++;
    if (i >= input.length) break;

    const eq = input.indexOf("=", i);
    if (eq === -1) {
      throw invalidChallenge(`expected key=value near "${input.slice(i)}"`);
    }
    const key = input.slice(i, eq).trim().toLowerCase();
    i = eq + 1;
    while (input[i] === " " || input[i] === "\t") i++;

    let value = "";
    if (input[i] === '"') {
      i++;
      while (i < input.length && input[i] !== '"') {
        if (input[i] === "\\" && i + 1 < input.length) i++;
        value += input[i];
        i++;
      }
      if (i >= input.length) {
        throw invalidChallenge(`unterminated quoted value for ${key}`);
      }
      i++;
    } else {
      const end = input.indexOf(",", i);
      const stop = end === -1 ? input.length : end;
      value = input.slice(i, stop).trim();
      i = stop;
    }
    params.set(key, value);
  }

  return params;
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

function invalidChallenge(detail: string): AuthProbeError {
  return new AuthProbeError({ type: "invalid-challenge", detail });
}
