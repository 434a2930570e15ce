export { WebDAVClient, PROPFIND_ALLPROP } from "./client";
export { AxiosTransport, toPem } from "./transport";
export type { AxiosTransportOptions } from "./transport";
export { Authenticator, basicAuthHeader } from "./auth/authenticate";
export { DigestSession } from "./auth/digestSession";
export { DigestChallenge, parseDigestChallenge } from "./utils/digest";
export type { DigestContext, DigestChallengeParams } from "./utils/digest";
export {
  decodeMultiStatus,
  decodeListEntities,
  encodeListEntities,
  toListEntity,
  parseHttpDate,
  formatHttpDate,
  parseServerError,
} from "./utils/parser";
export {
  WebDAVError,
  TransportError,
  RequestError,
  AuthProbeError,
  AuthComputeError,
  MissingAuthContextError,
  DecodeError,
  ServerError,
} from "./errors";
export type {
  WebDAVErrorKind,
  DecodeReason,
  AuthProbeReason,
} from "./errors";
export type {
  Auth,
  Depth,
  WebDAVOptions,
  TlsOptions,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  MultiStatus,
  ResourceResponse,
  PropStat,
  PropertyBag,
  ResourceType,
  ListEntity,
  ListFile,
  ListFolder,
} from "./models";
