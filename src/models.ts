import type { AxiosInstance } from "axios";

export type Auth =
  | { type: "anonymous" }
  | { type: "basic"; username: string; password: string }
  | { type: "digest"; username: string; password: string };

export type Depth = { type: "number"; value: number } | { type: "infinity" };

export interface TlsOptions {
  /** Accept certificates that do not chain to a trusted root. */
  rejectUnauthorized?: boolean;
  /** Extra trusted CA, PEM text or DER bytes. */
  ca?: string | Buffer;
  /** Path to a PEM or DER encoded CA certificate. */
  caFile?: string;
}

export interface WebDAVOptions {
  baseUrl: string;
  auth?: Auth;
  requestTimeout?: number;
  logRequests?: boolean;
  tls?: TlsOptions;
  /** Preconfigured axios instance used by the default transport. */
  agent?: AxiosInstance;
  /** Replaces the axios transport entirely. */
  transport?: HttpTransport;
}

export interface HttpRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string | Uint8Array;
}

export interface HttpResponse {
  status: number;
  /** Header names are lower-case. */
  headers: Record<string, string>;
  data: Buffer;
}

export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

export interface ResourceType {
  collection: boolean;
  redirectRef: boolean;
  redirectLifetime: boolean;
  addressBook: boolean;
}

export interface PropertyBag {
  lastModified?: Date;
  resourceType: ResourceType;
  quotaUsedBytes?: number;
  quotaAvailableBytes?: number;
  tag?: string;
  contentLength?: number;
  contentType?: string;
  calendarData?: string;
}

export interface PropStat {
  status: string;
  prop: PropertyBag;
}

export interface ResourceResponse {
  href: string;
  propStats: PropStat[];
}

export interface MultiStatus {
  responses: ResourceResponse[];
}

export interface ListFile {
  type: "file";
  href: string;
  lastModified: Date;
  contentLength: number;
  contentType: string;
  tag?: string;
}

export interface ListFolder {
  type: "folder";
  href: string;
  lastModified: Date;
  quotaUsedBytes?: number;
  quotaAvailableBytes?: number;
  tag?: string;
  isAddressBook: boolean;
}

export type ListEntity = ListFile | ListFolder;
