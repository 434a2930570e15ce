import { DecodeError, ServerError } from "../errors";
import { ListEntity } from "../models";
import {
  decodeListEntities,
  decodeMultiStatus,
  encodeListEntities,
  parseHttpDate,
  parseServerError,
} from "./parser";

const APR_10_2019 = Date.UTC(2019, 3, 10, 14, 0, 0);

function multistatus(...responses: string[]): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<D:multistatus xmlns:D="DAV:" xmlns:C="urn:ietf:params:xml:ns:carddav">
${responses.join("\n")}
</D:multistatus>`;
}

function response(href: string, ...propstats: string[]): string {
  return `<D:response><D:href>${href}</D:href>${propstats.join("")}</D:response>`;
}

function propstat(status: string, props: string): string {
  return `<D:propstat><D:prop>${props}</D:prop><D:status>${status}</D:status></D:propstat>`;
}

const OK = "HTTP/1.1 200 OK";
const NOT_FOUND = "HTTP/1.1 404 Not Found";
const LAST_MODIFIED =
  "<D:getlastmodified>Wed, 10 Apr 2019 14:00:00 GMT</D:getlastmodified>";
const COLLECTION = "<D:resourcetype><D:collection/></D:resourcetype>";

function decodeError(fn: () => unknown): DecodeError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DecodeError) return error;
    throw error;
  }
  throw new Error("expected a DecodeError");
}

describe("decodeListEntities", () => {
  it("decodes a folder", () => {
    const xml = multistatus(
      response(
        "/remote.php/dav/files/admin",
        propstat(
          OK,
          `${LAST_MODIFIED}${COLLECTION}<D:getetag>"5cafae80b1e3e"</D:getetag><D:getcontenttype>httpd/unix-directory</D:getcontenttype>`
        )
      )
    );
    expect(decodeListEntities(xml)).toEqual([
      {
        type: "folder",
        href: "/remote.php/dav/files/admin",
        lastModified: new Date(APR_10_2019),
        quotaUsedBytes: undefined,
        quotaAvailableBytes: undefined,
        tag: '"5cafae80b1e3e"',
        isAddressBook: false,
      },
    ]);
  });

  it("decodes a file", () => {
    const xml = multistatus(
      response(
        "/remote.php/dav/files/admin/file.txt",
        propstat(
          OK,
          `<D:displayname>file.txt</D:displayname>${LAST_MODIFIED}<D:resourcetype/><D:getetag>"5cafae80b1e3e"</D:getetag><D:getcontenttype>application/text</D:getcontenttype><D:getcontentlength>1234</D:getcontentlength>`
        )
      )
    );
    expect(decodeListEntities(xml)).toEqual([
      {
        type: "file",
        href: "/remote.php/dav/files/admin/file.txt",
        lastModified: new Date(APR_10_2019),
        contentLength: 1234,
        contentType: "application/text",
        tag: '"5cafae80b1e3e"',
      },
    ]);
  });

  it("builds the entity from the 2xx block only", () => {
    const xml = multistatus(
      response(
        "/files/",
        propstat(
          OK,
          `${LAST_MODIFIED}${COLLECTION}<D:quota-used-bytes>1024</D:quota-used-bytes><D:quota-available-bytes>-3</D:quota-available-bytes>`
        ),
        propstat(NOT_FOUND, "")
      )
    );
    const [entity] = decodeListEntities(xml);
    expect(entity).toEqual({
      type: "folder",
      href: "/files/",
      lastModified: new Date(APR_10_2019),
      quotaUsedBytes: 1024,
      quotaAvailableBytes: -3,
      tag: undefined,
      isAddressBook: false,
    });
  });

  it("skips failed blocks that come first", () => {
    const xml = multistatus(
      response(
        "/files/a.txt",
        propstat(NOT_FOUND, "<D:getcontentlength/><D:getcontenttype/>"),
        propstat("HTTP/1.1 201 Created", `${LAST_MODIFIED}<D:getcontentlength>7</D:getcontentlength>`)
      )
    );
    const [entity] = decodeListEntities(xml);
    expect(entity.type).toBe("file");
    expect(entity).toMatchObject({ contentLength: 7, contentType: "" });
  });

  it("fails when no block has a 2xx status", () => {
    const xml = multistatus(
      response("/files/a.txt", propstat(NOT_FOUND, LAST_MODIFIED))
    );
    expect(decodeError(() => decodeListEntities(xml)).reason).toEqual({
      type: "field-not-found",
      field: "propstat with valid status",
    });
  });

  it("requires last-modified on files", () => {
    const xml = multistatus(
      response("/files/a.txt", propstat(OK, "<D:resourcetype/><D:getcontentlength>5</D:getcontentlength>"))
    );
    expect(decodeError(() => decodeListEntities(xml)).reason).toEqual({
      type: "field-not-found",
      field: "last_modified",
    });
  });

  it("falls back to the epoch for folders without last-modified", () => {
    const xml = multistatus(
      response("/files/", propstat(OK, `${COLLECTION}<D:getcontentlength>5</D:getcontentlength>`))
    );
    const [entity] = decodeListEntities(xml);
    expect(entity.type).toBe("folder");
    expect(entity.lastModified.toISOString()).toBe("1970-01-01T00:00:00.000Z");
  });

  it("marks address books", () => {
    const xml = multistatus(
      response(
        "/addressbooks/user/contacts/",
        propstat(OK, "<D:resourcetype><D:collection/><C:addressbook/></D:resourcetype>")
      )
    );
    expect(decodeListEntities(xml)).toEqual([
      {
        type: "folder",
        href: "/addressbooks/user/contacts/",
        lastModified: new Date(0),
        quotaUsedBytes: undefined,
        quotaAvailableBytes: undefined,
        tag: undefined,
        isAddressBook: true,
      },
    ]);
  });

  it("rejects redirect references whatever else is present", () => {
    const xml = multistatus(
      response(
        "/files/link",
        propstat(
          OK,
          `${LAST_MODIFIED}<D:resourcetype><D:collection/><D:redirectref/></D:resourcetype>`
        )
      )
    );
    expect(decodeError(() => decodeListEntities(xml)).reason).toEqual({
      type: "field-not-supported",
      field: "redirect_ref",
    });
  });

  it("rejects redirect lifetimes", () => {
    const xml = multistatus(
      response(
        "/files/link",
        propstat(OK, `${LAST_MODIFIED}<D:resourcetype><D:redirect-lifetime/></D:resourcetype>`)
      )
    );
    expect(decodeError(() => decodeListEntities(xml)).reason).toEqual({
      type: "field-not-supported",
      field: "redirect_ref",
    });
  });

  it("treats empty scalars as absent", () => {
    const xml = multistatus(
      response(
        "/files/",
        propstat(
          OK,
          `<D:getlastmodified></D:getlastmodified>${COLLECTION}<D:quota-used-bytes></D:quota-used-bytes>`
        )
      ),
      response(
        "/files/a.bin",
        propstat(OK, `${LAST_MODIFIED}<D:getcontentlength></D:getcontentlength>`)
      )
    );
    const [folder, file] = decodeListEntities(xml);
    expect(folder).toMatchObject({
      type: "folder",
      lastModified: new Date(0),
      quotaUsedBytes: undefined,
    });
    expect(file).toMatchObject({ type: "file", contentLength: 0 });
  });

  it("keeps the server's response order", () => {
    const names = ["/b/", "/a.txt", "/c/"];
    const xml = multistatus(
      ...names.map((href) =>
        response(
          href,
          propstat(OK, href.endsWith("/") ? `${LAST_MODIFIED}${COLLECTION}` : LAST_MODIFIED)
        )
      )
    );
    expect(decodeListEntities(xml).map((e) => e.href)).toEqual(names);
  });

  it("ignores namespace prefixes", () => {
    const xml = `<?xml version="1.0"?>
<multistatus xmlns="DAV:">
  <response>
    <href>/plain.txt</href>
    <propstat>
      <prop><getlastmodified>Wed, 10 Apr 2019 14:00:00 GMT</getlastmodified></prop>
      <status>HTTP/1.1 200 OK</status>
    </propstat>
  </response>
</multistatus>`;
    expect(decodeListEntities(xml)[0]).toMatchObject({
      type: "file",
      href: "/plain.txt",
      contentLength: 0,
    });
  });
});

describe("decodeMultiStatus", () => {
  it("keeps every propstat block in order", () => {
    const xml = multistatus(
      response(
        "/files/",
        propstat(OK, `${LAST_MODIFIED}${COLLECTION}`),
        propstat(NOT_FOUND, "<D:getetag/>")
      )
    );
    const { responses } = decodeMultiStatus(xml);
    expect(responses).toHaveLength(1);
    expect(responses[0].propStats.map((ps) => ps.status)).toEqual([
      OK,
      NOT_FOUND,
    ]);
    expect(responses[0].propStats[1].prop.tag).toBeUndefined();
  });

  it("carries calendar data", () => {
    const xml = multistatus(
      response(
        "/cal/event.ics",
        propstat(OK, `${LAST_MODIFIED}<cal:calendar-data xmlns:cal="urn:ietf:params:xml:ns:caldav">BEGIN:VCALENDAR</cal:calendar-data>`)
      )
    );
    const { responses } = decodeMultiStatus(xml);
    expect(responses[0].propStats[0].prop.calendarData).toBe("BEGIN:VCALENDAR");
  });

  it("returns no responses for an empty multistatus", () => {
    expect(decodeMultiStatus('<D:multistatus xmlns:D="DAV:"/>')).toEqual({
      responses: [],
    });
  });

  it("rejects malformed XML", () => {
    expect(decodeError(() => decodeMultiStatus("<D:multistatus>")).reason.type).toBe(
      "xml"
    );
  });

  it("rejects documents without a multistatus root", () => {
    expect(decodeError(() => decodeMultiStatus("<html><body/></html>")).reason).toEqual({
      type: "field-not-found",
      field: "multistatus",
    });
  });

  it("requires an href per response", () => {
    const xml = multistatus(`<D:response>${propstat(OK, LAST_MODIFIED)}</D:response>`);
    expect(decodeError(() => decodeMultiStatus(xml)).reason).toEqual({
      type: "field-not-found",
      field: "href",
    });
  });

  it("names the offending timestamp", () => {
    const xml = multistatus(
      response(
        "/a.txt",
        propstat(OK, "<D:getlastmodified>2019-04-10T14:00:00Z</D:getlastmodified>")
      )
    );
    expect(decodeError(() => decodeMultiStatus(xml)).reason).toEqual({
      type: "invalid-value",
      field: "getlastmodified",
      value: "2019-04-10T14:00:00Z",
    });
  });

  it("names the offending number", () => {
    const xml = multistatus(
      response(
        "/a.txt",
        propstat(OK, `${LAST_MODIFIED}<D:getcontentlength>12kb</D:getcontentlength>`)
      )
    );
    expect(decodeError(() => decodeMultiStatus(xml)).reason).toEqual({
      type: "invalid-value",
      field: "getcontentlength",
      value: "12kb",
    });
  });
});

describe("parseHttpDate", () => {
  it("parses an HTTP-date", () => {
    expect(parseHttpDate("Wed, 10 Apr 2019 14:00:00 GMT")?.getTime()).toBe(
      APR_10_2019
    );
  });

  it("returns undefined for an empty string", () => {
    expect(parseHttpDate("")).toBeUndefined();
  });

  it("rejects a weekday that does not match the date", () => {
    expect(() => parseHttpDate("Thu, 10 Apr 2019 14:00:00 GMT")).toThrow(
      DecodeError
    );
  });

  it("rejects impossible dates", () => {
    expect(() => parseHttpDate("Sun, 31 Feb 2019 14:00:00 GMT")).toThrow(
      DecodeError
    );
  });
});

describe("encodeListEntities", () => {
  it("round-trips href, tag and lastModified", () => {
    const entities: ListEntity[] = [
      {
        type: "folder",
        href: "/files/docs/",
        lastModified: new Date(APR_10_2019),
        quotaUsedBytes: 2048,
        tag: '"dir-1"',
        isAddressBook: false,
      },
      {
        type: "file",
        href: "/files/docs/a&b.txt",
        lastModified: new Date(Date.UTC(2024, 4, 21, 11, 20, 30)),
        contentLength: 1234,
        contentType: "text/plain",
        tag: '"abc"',
      },
      {
        type: "folder",
        href: "/addressbooks/user/contacts/",
        lastModified: new Date(0),
        isAddressBook: true,
      },
    ];

    const decoded = decodeListEntities(encodeListEntities(entities));

    expect(decoded.map((e) => e.type)).toEqual(["folder", "file", "folder"]);
    expect(decoded.map((e) => e.href)).toEqual(entities.map((e) => e.href));
    expect(decoded.map((e) => e.tag)).toEqual(['"dir-1"', '"abc"', undefined]);
    expect(decoded.map((e) => e.lastModified.getTime())).toEqual(
      entities.map((e) => e.lastModified.getTime())
    );
    expect(decoded[1]).toMatchObject({ contentLength: 1234, contentType: "text/plain" });
    expect(decoded[2]).toMatchObject({ isAddressBook: true });
  });
});

describe("parseServerError", () => {
  it("reads exception and message from a SabreDAV error body", () => {
    const body = `<?xml version="1.0" encoding="utf-8"?>
<d:error xmlns:d="DAV:" xmlns:s="http://sabredav.org/ns">
  <s:exception>Sabre\\DAV\\Exception\\NotFound</s:exception>
  <s:message>File with name missing.txt could not be located</s:message>
</d:error>`;
    const error = parseServerError(404, body);
    expect(error).toBeInstanceOf(ServerError);
    expect(error.responseCode).toBe(404);
    expect(error.exception).toBe("Sabre\\DAV\\Exception\\NotFound");
    expect(error.serverMessage).toBe(
      "File with name missing.txt could not be located"
    );
  });

  it("keeps the raw body when it is not an error document", () => {
    const error = parseServerError(403, "Forbidden");
    expect(error.exception).toBe("server exception and parse error");
    expect(error.serverMessage).toBe("Forbidden");
  });
});
