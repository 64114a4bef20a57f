import { describe, expect, test } from "vitest";
import { DeserializationError } from "../errors.js";
import { command, describeRequest, fields, int, list, parseDocument, select, text, texts, toXml, tree } from "../xml.js";

describe("toXml", () => {
  test("nests elements along a > path", () => {
    const req = command("request", { path: "bootstrap>vm-auth-key>generate>lifetime", value: 8 });
    expect(toXml(req)).toBe(
      "<request><bootstrap><vm-auth-key><generate><lifetime>8</lifetime></generate></vm-auth-key></bootstrap></request>",
    );
  });

  test("accepts . as a path separator", () => {
    expect(toXml(command("show", { path: "system.info", value: "" }))).toBe("<show><system><info/></system></show>");
  });

  test("self-closes empty elements", () => {
    expect(toXml(command("show", { path: "clock", value: "" }))).toBe("<show><clock/></show>");
  });

  test("@segment sets an attribute on its parent", () => {
    const req = command(
      "request",
      { path: "move-dg>entry>@name", value: "branch" },
      { path: "move-dg>entry>new-parent-dg", value: "region" },
    );
    expect(toXml(req)).toBe(
      '<request><move-dg><entry name="branch"><new-parent-dg>region</new-parent-dg></entry></move-dg></request>',
    );
  });

  test("omitEmpty drops the element", () => {
    const req = command(
      "request",
      { path: "move-dg>entry>@name", value: "branch" },
      { path: "move-dg>entry>new-parent-dg", value: "", omitEmpty: true },
    );
    expect(toXml(req)).toBe('<request><move-dg><entry name="branch"/></move-dg></request>');
  });

  test("escapes markup in values", () => {
    expect(toXml(command("show", { path: "name", value: "a<b&c" }))).toBe("<show><name>a&lt;b&amp;c</name></show>");
  });
});

describe("describeRequest", () => {
  test("joins root and element names", () => {
    expect(describeRequest(command("show", { path: "jobs>id", value: "4" }))).toBe("show jobs id");
  });

  test("skips attribute segments", () => {
    expect(describeRequest(command("request", { path: "move-dg>entry>@name", value: "x" }))).toBe("request move-dg entry");
  });
});

describe("parseDocument", () => {
  test("rejects malformed XML with the raw payload attached", () => {
    const raw = "<response><result>";
    try {
      parseDocument(raw);
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(DeserializationError);
      expect((err as DeserializationError).raw).toBe(raw);
    }
  });

  test("rejects text that is not XML", () => {
    expect(() => parseDocument("Service Unavailable")).toThrow(DeserializationError);
  });
});

describe("decoders", () => {
  const doc = parseDocument(
    '<response status="success"><result>' +
    '<dg-hierarchy><dg name="a"><dg name="b"/></dg><dg name="c"/></dg-hierarchy>' +
    '<msg code="7">  hello  </msg>' +
    "<id>007</id><progress>42</progress><bad>n/a</bad>" +
    "<details><line>first</line><line>second</line></details>" +
    "<system><hostname>pano-1</hostname><sw-version>11.1.0</sw-version></system>" +
    "</result></response>",
  );

  test("text reads attributes", () => {
    expect(text("response>@status")(doc)).toBe("success");
  });

  test("text reads element text next to attributes, trimmed", () => {
    expect(text("response>result>msg")(doc)).toBe("hello");
  });

  test("text keeps values as strings", () => {
    expect(text("response>result>id")(doc)).toBe("007");
  });

  test("missing paths decode to defaults", () => {
    expect(text("response>result>nope")(doc)).toBe("");
    expect(int("response>result>nope")(doc)).toBe(0);
    expect(texts("response>result>nope>line")(doc)).toEqual([]);
    expect(fields("response>result>nope")(doc)).toEqual({});
  });

  test("int parses numbers and falls back to 0", () => {
    expect(int("response>result>progress")(doc)).toBe(42);
    expect(int("response>result>bad")(doc)).toBe(0);
  });

  test("list maps every match in document order", () => {
    expect(list("response>result>dg-hierarchy>dg", text("@name"))(doc)).toEqual(["a", "c"]);
  });

  test("select descends through repeated elements", () => {
    expect(select(doc, "response>result>dg-hierarchy>dg>dg").map((n) => text("@name")(n))).toEqual(["b"]);
  });

  test("texts collects repeated lines", () => {
    expect(texts("response>result>details>line")(doc)).toEqual(["first", "second"]);
  });

  test("tree returns plain data without parser prefixes", () => {
    expect(tree("response>result>msg")(doc)).toEqual({ code: "7", text: "hello" });
    expect(tree("response>result>dg-hierarchy")(doc)).toEqual({
      dg: [{ name: "a", dg: { name: "b" } }, { name: "c" }],
    });
    expect(tree("response>result>id")(doc)).toBe("007");
    expect(tree("response>result>nope")(doc)).toBeNull();
  });

  test("tree prefers child elements over attributes of the same name", () => {
    expect(tree("entry")(parseDocument('<entry name="x"><name>y</name></entry>'))).toEqual({ name: "y" });
  });

  test("fields flattens child elements", () => {
    expect(fields("response>result>system")(doc)).toEqual({ hostname: "pano-1", "sw-version": "11.1.0" });
  });
});
