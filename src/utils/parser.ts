import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { DecodeError, ServerError } from "../errors";
import {
  ListEntity,
  MultiStatus,
  PropertyBag,
  PropStat,
  ResourceResponse,
  ResourceType,
} from "../models";
import { asArray, first } from "./common";

const EPOCH = new Date(0);

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTHS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];
const HTTP_DATE = new RegExp(
  "^([A-Z][a-z]{2}), (\\d{1,2}) ([A-Z][a-z]{2}) (\\d{4}) " +
    "(\\d{2}):(\\d{2}):(\\d{2}) GMT$"
);

const multistatusParser = new XMLParser({
  removeNSPrefix: true,
  ignoreAttributes: true,
  parseTagValue: false,
  isArray: (name) => name === "response" || name === "propstat",
});

const errorParser = new XMLParser({
  removeNSPrefix: true,
  ignoreAttributes: true,
  parseTagValue: false,
});

const builder = new XMLBuilder({
  ignoreAttributes: false,
  format: true,
  suppressEmptyNode: true,
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function textOf(node: unknown): string | undefined {
  if (typeof node === "string") return node;
  if (typeof node === "number" || typeof node === "boolean")
    return String(node);
  if (Array.isArray(node)) return textOf(first(node));
  if (isNode(node) && "#text" in node) return textOf(node["#text"]);
  return undefined;
}

/** Text of `node[key]`, with an empty string treated as absent. */
function optionalText(node: XmlNode, key: string): string | undefined {
  const text = textOf(node[key]);
  return text === undefined || text === "" ? undefined : text;
}

/**
 * Parses an HTTP-date (`Wed, 10 Apr 2019 14:00:00 GMT`).
 * @returns `undefined` for an empty string.
 * @throws DecodeError for anything else that is not a valid HTTP-date.
 */
export function parseHttpDate(
  value: string | undefined,
  field = "getlastmodified"
): Date | undefined {
  if (value === undefined || value === "") return undefined;
  const invalid = () =>
    new DecodeError({ type: "invalid-value", field, value });

  const match = HTTP_DATE.exec(value);
  if (!match) throw invalid();
  const [, weekday, day, month, year, hh, mm, ss] = match;

  const monthIndex = MONTHS.indexOf(month);
  if (
    monthIndex === -1 ||
    Number(hh) > 23 ||
    Number(mm) > 59 ||
    Number(ss) > 59
  )
    throw invalid();

  const date = new Date(
    Date.UTC(
      Number(year),
      monthIndex,
      Number(day),
      Number(hh),
      Number(mm),
      Number(ss)
    )
  );
  if (
    date.getUTCDate() !== Number(day) ||
    date.getUTCMonth() !== monthIndex ||
    WEEKDAYS[date.getUTCDay()] !== weekday
  )
    throw invalid();
  return date;
}

/** Formats a date as an HTTP-date. */
export function formatHttpDate(date: Date): string {
  return date.toUTCString();
}

function parseInteger(
  value: string | undefined,
  field: string
): number | undefined {
  if (value === undefined || value === "") return undefined;
  const n = Number(value);
  if (!/^-?\d+$/.test(value) || !Number.isSafeInteger(n)) {
    throw new DecodeError({ type: "invalid-value", field, value });
  }
  return n;
}

function parseResourceType(node: unknown): ResourceType {
  const rt = isNode(node) ? node : {};
  return {
    collection: rt.collection !== undefined,
    redirectRef: rt.redirectref !== undefined,
    redirectLifetime: rt["redirect-lifetime"] !== undefined,
    addressBook: rt.addressbook !== undefined,
  };
}

function parseProp(node: unknown): PropertyBag {
  const prop = isNode(node) ? node : {};
  return {
    lastModified: parseHttpDate(textOf(prop.getlastmodified)),
    resourceType: parseResourceType(prop.resourcetype),
    quotaUsedBytes: parseInteger(
      textOf(prop["quota-used-bytes"]),
      "quota-used-bytes"
    ),
    quotaAvailableBytes: parseInteger(
      textOf(prop["quota-available-bytes"]),
      "quota-available-bytes"
    ),
    tag: optionalText(prop, "getetag"),
    contentLength: parseInteger(
      textOf(prop.getcontentlength),
      "getcontentlength"
    ),
    contentType: optionalText(prop, "getcontenttype"),
    calendarData: optionalText(prop, "calendar-data"),
  };
}

function parsePropStat(node: unknown): PropStat {
  const ps = isNode(node) ? node : {};
  return {
    status: textOf(ps.status) ?? "",
    prop: parseProp(ps.prop),
  };
}

function parseResponse(node: unknown): ResourceResponse {
  const resp = isNode(node) ? node : {};
  const href = textOf(resp.href);
  if (href === undefined) {
    throw new DecodeError({ type: "field-not-found", field: "href" });
  }
  return {
    href,
    propStats: asArray(resp.propstat).map(parsePropStat),
  };
}

/**
 * Decodes a PROPFIND `207 Multi-Status` body into per-resource records,
 * keeping every propstat block in document order.
 */
export function decodeMultiStatus(xml: string): MultiStatus {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new DecodeError({
      type: "xml",
      detail: `${valid.err.msg} (line ${valid.err.line}, col ${valid.err.col})`,
    });
  }

  const parsed: unknown = multistatusParser.parse(xml);
  const root = isNode(parsed) ? parsed.multistatus : undefined;
  if (root === undefined) {
    throw new DecodeError({ type: "field-not-found", field: "multistatus" });
  }
  const responses = isNode(root) ? asArray(root.response) : [];
  return { responses: responses.map(parseResponse) };
}

function isSuccessStatus(status: string): boolean {
  const code = status.trim().split(/\s+/)[1];
  return code !== undefined && code.startsWith("2");
}

/**
 * Builds the entity for one resource from its first 2xx propstat block.
 */
export function toListEntity(response: ResourceResponse): ListEntity {
  const block = response.propStats.find((ps) => isSuccessStatus(ps.status));
  if (!block) {
    throw new DecodeError({
      type: "field-not-found",
      field: "propstat with valid status",
    });
  }

  const prop = block.prop;
  const rt = prop.resourceType;
  if (rt.redirectRef || rt.redirectLifetime) {
    throw new DecodeError({
      type: "field-not-supported",
      field: "redirect_ref",
    });
  }

  if (rt.collection) {
    // address book roots on some servers carry no getlastmodified
    return {
      type: "folder",
      href: response.href,
      lastModified: prop.lastModified ?? EPOCH,
      quotaUsedBytes: prop.quotaUsedBytes,
      quotaAvailableBytes: prop.quotaAvailableBytes,
      tag: prop.tag,
      isAddressBook: rt.addressBook,
    };
  }

  if (!prop.lastModified) {
    throw new DecodeError({ type: "field-not-found", field: "last_modified" });
  }
  return {
    type: "file",
    href: response.href,
    lastModified: prop.lastModified,
    contentLength: prop.contentLength ?? 0,
    contentType: prop.contentType ?? "",
    tag: prop.tag,
  };
}

export function decodeListEntities(xml: string): ListEntity[] {
  return decodeMultiStatus(xml).responses.map(toListEntity);
}

function entityNode(entity: ListEntity): XmlNode {
  const prop: XmlNode = {
    "D:getlastmodified": formatHttpDate(entity.lastModified),
  };
  switch (entity.type) {
    case "folder": {
      const rt: XmlNode = { "D:collection": "" };
      if (entity.isAddressBook) {
        rt["C:addressbook"] = { "@_xmlns:C": "urn:ietf:params:xml:ns:carddav" };
      }
      prop["D:resourcetype"] = rt;
      if (entity.quotaUsedBytes !== undefined)
        prop["D:quota-used-bytes"] = String(entity.quotaUsedBytes);
      if (entity.quotaAvailableBytes !== undefined)
        prop["D:quota-available-bytes"] = String(entity.quotaAvailableBytes);
      break;
    }
    case "file":
      prop["D:resourcetype"] = "";
      prop["D:getcontentlength"] = String(entity.contentLength);
      prop["D:getcontenttype"] = entity.contentType;
      break;
  }
  if (entity.tag !== undefined) prop["D:getetag"] = entity.tag;

  return {
    "D:href": entity.href,
    "D:propstat": { "D:prop": prop, "D:status": "HTTP/1.1 200 OK" },
  };
}

/**
 * Serializes entities back into a multistatus document that
 * `decodeListEntities` reads to the same href, tag and lastModified.
 */
export function encodeListEntities(entities: ListEntity[]): string {
  const body = builder.build({
    "D:multistatus": {
      "@_xmlns:D": "DAV:",
      "D:response": entities.map(entityNode),
    },
  });
  return `<?xml version="1.0" encoding="utf-8"?>\n${body}`;
}

/**
 * Builds the error for a non-2xx response from a SabreDAV style
 * `<d:error><s:exception/><s:message/></d:error>` body.
 */
export function parseServerError(status: number, body: string): ServerError {
  const fallback = new ServerError(
    status,
    "server exception and parse error",
    body
  );
  if (body.trim() === "" || XMLValidator.validate(body) !== true) {
    return fallback;
  }

  const parsed: unknown = errorParser.parse(body);
  if (!isNode(parsed)) return fallback;
  const rootKey = Object.keys(parsed).find((k) => !k.startsWith("?"));
  const root = rootKey === undefined ? undefined : parsed[rootKey];
  if (!isNode(root)) return fallback;

  const exception = textOf(root.exception);
  const message = textOf(root.message);
  if (exception === undefined || message === undefined) return fallback;
  return new ServerError(status, exception, message);
}
