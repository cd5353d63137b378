import { describe, it, expect } from "vitest";
import { ParseError } from "../errors";
import { parseAtomEntry, parseAtomFeed, renderAtomEntry } from "./atom";
import { createXmlContentEntry } from "./content";

const ENTRY_DOCUMENT = `<?xml version="1.0" encoding="utf-8"?>
<entry xmlns="http://www.w3.org/2005/Atom">
  <id>urn:vehicle0</id>
  <title>vehicle0</title>
  <content type="application/xml">
    <entity><name>vehicle0</name><tags repeatable="true">fast</tags></entity>
  </content>
</entry>`;

const FEED_DOCUMENT = `<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Vehicles</title>
  <entry><id>urn:vehicle0</id><content type="application/xml"><entity><name>vehicle0</name></entity></content></entry>
  <entry><id>urn:vehicle1</id><content type="application/xml"><entity><name>vehicle1</name></entity></content></entry>
</feed>`;

describe("parseAtomEntry", () => {
  it("should read the id and re-serialize XML content", () => {
    expect(parseAtomEntry(ENTRY_DOCUMENT)).toEqual({
      id: "urn:vehicle0",
      content: {
        type: "application/xml",
        xml: '<entity><name>vehicle0</name><tags repeatable="true">fast</tags></entity>',
      },
    });
  });

  it("should decode character references in XML content", () => {
    const entry = parseAtomEntry(
      '<entry xmlns="http://www.w3.org/2005/Atom"><content type="application/xml"><a>&#65;&amp;</a></content></entry>',
    );

    expect(entry.content?.xml).toBe("<a>A&amp;</a>");
  });

  it("should read non-XML content as text", () => {
    const entry = parseAtomEntry(
      '<entry xmlns="http://www.w3.org/2005/Atom"><content type="text">fish &amp; chips</content></entry>',
    );

    expect(entry).toEqual({ id: null, content: { type: "text", xml: "fish & chips" } });
  });

  it("should return null content for an entry without content", () => {
    expect(parseAtomEntry("<entry><id>urn:x</id></entry>")).toEqual({
      id: "urn:x",
      content: null,
    });
  });

  it("should reject documents that are not entries", () => {
    expect(() => parseAtomEntry(FEED_DOCUMENT)).toThrow(
      "expected an Atom entry, found <feed>",
    );
    expect(() => parseAtomEntry("<entry>")).toThrow(ParseError);
    expect(() => parseAtomEntry("<entry></entry><entry/>")).toThrow(
      "XML document has more than one root element",
    );
  });
});

describe("parseAtomFeed", () => {
  it("should return every entry in document order", () => {
    const entries = parseAtomFeed(FEED_DOCUMENT);

    expect(entries.map((entry) => entry.id)).toEqual(["urn:vehicle0", "urn:vehicle1"]);
    expect(entries[1]?.content?.xml).toBe("<entity><name>vehicle1</name></entity>");
  });

  it("should return no entries for an empty feed", () => {
    expect(parseAtomFeed("<feed><title>Empty</title></feed>")).toEqual([]);
  });

  it("should reject documents that are not feeds", () => {
    expect(() => parseAtomFeed(ENTRY_DOCUMENT)).toThrow(
      "expected an Atom feed, found <entry>",
    );
  });
});

describe("renderAtomEntry", () => {
  it("should inline the XML payload in an Atom entry", () => {
    const xml = renderAtomEntry(
      createXmlContentEntry("<entity><name>vehicle0</name></entity>"),
    );

    expect(xml).toBe(
      '<entry xmlns="http://www.w3.org/2005/Atom"><content type="application/xml"><entity><name>vehicle0</name></entity></content></entry>',
    );
  });

  it("should render the id and escape text content", () => {
    const xml = renderAtomEntry({
      id: "urn:vehicle0",
      content: { type: "text", xml: "a & b" },
    });

    expect(xml).toBe(
      '<entry xmlns="http://www.w3.org/2005/Atom"><id>urn:vehicle0</id><content type="text">a &amp; b</content></entry>',
    );
  });

  it("should read back what it renders", () => {
    const entry = {
      id: "urn:vehicle0",
      content: {
        type: "application/xml",
        xml: '<entity><b repeatable="true">x</b><c></c></entity>',
      },
    };

    expect(parseAtomEntry(renderAtomEntry(entry))).toEqual(entry);
  });

  it("should reject malformed XML content", () => {
    expect(() => renderAtomEntry(createXmlContentEntry("<entity>"))).toThrow(
      ParseError,
    );
  });
});
