import { describe, expect, it } from "vitest";

import {
  HtlDepthExceededError,
  HtlParseError,
  MAX_STACK_DEPTH,
  parse,
  parseOrThrow,
  render,
} from "../../src/index.js";

function toHtml(input: string): string {
  const { tree, error } = parse(input);
  expect(error).toBeUndefined();
  return render(tree);
}

function parseError(input: string): HtlParseError {
  const { tree, error } = parse(input);
  expect(tree).toBeUndefined();
  if (!error) {
    throw new Error(`expected a parse error for ${JSON.stringify(input)}`);
  }
  return error;
}

describe("parse", () => {
  describe("documents", () => {
    it.each([
      [
        '(a :href http://foo.bar/{{user}} "안녕")',
        '<a href="http://foo.bar/{{user}}">안녕</a>',
      ],
      ["(a :href foo)", '<a href="foo"></a>'],
      ["(br)", "<br/>"],
      ["(a :href foo )", '<a href="foo"></a>'],
      ["(a b)", "<a>b</a>"],
      ["(a b(c d))", "<a>b<c>d</c></a>"],
      ["(a (b (c)))", "<a><b><c></c></b></a>"],
      ["(a(b(c)))", "<a><b><c></c></b></a>"],
      [
        '(a :x 1 (b :z 2 :y 3 (c "foo bar" "baz")))',
        '<a x="1"><b y="3" z="2"><c>foo barbaz</c></b></a>',
      ],
    ])("renders %s", (input, expected) => {
      expect(toHtml(input)).toBe(expected);
    });

    it("returns neither tree nor error for empty input", () => {
      expect(parse("")).toEqual({ tree: undefined, error: undefined });
      expect(render(parse("").tree)).toBe("");
    });

    it("returns an empty anonymous root for whitespace-only input", () => {
      const { tree } = parse("  \n\t ");
      expect(tree).toMatchObject({ kind: "element", tag: "", children: [] });
      expect(render(tree)).toBe("");
    });

    it("keeps several top-level elements as siblings under the root", () => {
      const { tree } = parse("(p a)\n(p b)");
      expect(tree?.tag).toBe("");
      expect(tree?.children).toHaveLength(2);
      expect(render(tree)).toBe("<p>a</p><p>b</p>");
    });

    it("builds element and text nodes", () => {
      const { tree } = parse('(a :href foo "text" (b))');
      expect(tree).toEqual({
        kind: "element",
        tag: "",
        attributes: new Map(),
        children: [
          {
            kind: "element",
            tag: "a",
            attributes: new Map([["href", "foo"]]),
            children: [
              { kind: "text", text: "text" },
              {
                kind: "element",
                tag: "b",
                attributes: new Map(),
                children: [],
              },
            ],
          },
        ],
      });
    });
  });

  describe("attributes", () => {
    it("sorts attributes by key", () => {
      expect(toHtml("(a :x 1 (b :z 2 :y 3 (c)))")).toBe(
        '<a x="1"><b y="3" z="2"><c></c></b></a>'
      );
    });

    it("keeps the last value of a repeated key", () => {
      expect(toHtml("(a :x 1 :x 2)")).toBe('<a x="2"></a>');
    });

    it("accepts a quoted value right after the key", () => {
      expect(toHtml('(a :x"v")')).toBe('<a x="v"></a>');
    });

    it("accepts attributes after bare content", () => {
      expect(toHtml("(a b :c d)")).toBe('<a c="d">b</a>');
    });

    it("self-closes void tags with attributes", () => {
      expect(toHtml('(img :src "x.png")')).toBe('<img src="x.png"/>');
    });
  });

  describe("strings and escaping", () => {
    it("resolves control escapes in quoted strings", () => {
      expect(toHtml(String.raw`(a "x\ty\nz")`)).toBe("<a>x\ty\nz</a>");
      expect(toHtml(String.raw`(a "\f\r\v")`)).toBe("<a>\f\r\v</a>");
    });

    it("html-escapes quoted text, escaped quotes and backslashes included", () => {
      expect(toHtml(String.raw`(a :x "\\<>'\"" "content")`)).toBe(
        '<a x="\\&lt;&gt;&apos;&quot;">content</a>'
      );
    });

    it("routes unknown escapes through the html escape map", () => {
      expect(toHtml(String.raw`(a "\q\&")`)).toBe("<a>q&amp;</a>");
    });

    it("copies bare tokens without escaping", () => {
      expect(toHtml("(a b<c)")).toBe("<a>b<c</a>");
      expect(toHtml("(a :x 1&2)")).toBe('<a x="1&2"></a>');
    });

    it("escapes the same characters inside quotes", () => {
      expect(toHtml('(a "b<c")')).toBe("<a>b&lt;c</a>");
    });

    it("renders a lone underscore as a non-breaking space", () => {
      expect(toHtml("(p _)")).toBe("<p>&nbsp;</p>");
      expect(toHtml('(p "_")')).toBe("<p>&nbsp;</p>");
      expect(toHtml("(p __)")).toBe("<p>__</p>");
    });

    it("treats unicode white space as a separator", () => {
      expect(toHtml("(a\u00a0b)")).toBe("<a>b</a>");
    });
  });

  describe("comments", () => {
    it("ignores comments between tokens", () => {
      expect(
        toHtml(
          '(a ;comments\n :x ;comments\n"\\\\<>\'\\"" ;comments \n"content")'
        )
      ).toBe('<a x="\\&lt;&gt;&apos;&quot;">content</a>');
    });

    it("drops commented-out strings", () => {
      expect(toHtml('(a "b" ; "c"\n ;; "d"\n)')).toBe("<a>b</a>");
    });

    it("is transparent to the resulting tree", () => {
      expect(parse('(a "b" ; comment\n)')).toEqual(parse('(a "b")'));
    });

    it("accepts a trailing comment without a line break", () => {
      expect(toHtml("(a) ; trailing")).toBe("<a></a>");
    });

    it("keeps a semicolon inside a bare token", () => {
      expect(toHtml("(a;b)")).toBe("<a;b></a;b>");
    });
  });

  describe("top-level tokens", () => {
    it("keeps bare text followed by whitespace", () => {
      expect(toHtml("b (a)")).toBe("b<a></a>");
    });

    it("drops a trailing bare token outside any element", () => {
      expect(toHtml("(a) b")).toBe("<a></a>");
    });
  });

  describe("errors", () => {
    it("reports a missing closing paren", () => {
      const error = parseError("(a(b(c))");
      expect(error.kind).toBe("structural");
      expect(error.reason).toBe("missing 1 closing paren");
      expect(error.missingParens).toBe(1);
      expect(error.line).toBe(1);
      expect(error.column).toBe(8);
      expect(error.character).toBeUndefined();
    });

    it("counts several missing closing parens", () => {
      const error = parseError("(a(b");
      expect(error.message).toBe("missing 2 closing parens at line 1, column 4");
      expect(error.missingParens).toBe(2);
    });

    it("reports an extra closing paren with its position", () => {
      const error = parseError("(a(b(c))))");
      expect(error).toBeInstanceOf(HtlParseError);
      expect(error.reason).toBe("unexpected closing paren");
      expect(error.character).toBe(")");
      expect(error.line).toBe(1);
      expect(error.column).toBe(10);
      expect(error.message).toBe(
        'unexpected closing paren at line 1, column 10 (character ")")'
      );
    });

    it("tracks lines and resets columns after a line break", () => {
      const error = parseError("(a\n b)\n)");
      expect(error.line).toBe(3);
      expect(error.column).toBe(1);
    });

    it("counts columns in code points", () => {
      const error = parseError("(a 😀))");
      expect(error.column).toBe(6);
    });

    it("rejects a paren where an attribute value is expected", () => {
      expect(parseError("(a :x (b))")).toMatchObject({
        reason: "unexpected open paren",
        column: 7,
      });
      expect(parseError("(a :x )")).toMatchObject({
        reason: "unexpected close paren",
        column: 7,
      });
    });

    it("rejects a paren inside an attribute key", () => {
      expect(parseError("(a :x)")).toMatchObject({
        reason: "unexpected close paren",
        column: 6,
      });
      expect(parseError("(a :x(")).toMatchObject({
        reason: "unexpected open paren",
        column: 6,
      });
    });

    it("rejects a colon outside the attribute position", () => {
      expect(parseError('(a "b" :c d)')).toMatchObject({
        reason: "unexpected character",
        character: ":",
        column: 8,
      });
    });

    it("rejects backslashes outside quoted strings", () => {
      expect(parseError(String.raw`(a \b)`)).toMatchObject({
        reason: "backslash-escaping is not allowed here",
        column: 4,
      });
      expect(parseError(String.raw`(a b\c)`)).toMatchObject({
        reason: "backslash-escaping is not allowed here",
        column: 5,
      });
    });

    it("rejects an unterminated string", () => {
      const error = parseError('(a "bc');
      expect(error.reason).toBe("unterminated string");
      expect(error.line).toBe(1);
      expect(error.column).toBe(6);
      expect(error.character).toBeUndefined();
    });

    it("rejects a string left open by a trailing backslash", () => {
      expect(parseError('(a "bc\\').reason).toBe("unterminated string");
    });
  });

  describe("depth limit", () => {
    it("accepts nesting up to the stack limit", () => {
      const depth = MAX_STACK_DEPTH - 1;
      const input = "(a".repeat(depth) + ")".repeat(depth);
      expect(toHtml(input)).toBe("<a>".repeat(depth) + "</a>".repeat(depth));
    });

    it("fails on the first paren beyond the limit", () => {
      const depth = MAX_STACK_DEPTH;
      const error = parseError("(a".repeat(depth) + ")".repeat(depth));
      expect(error).toBeInstanceOf(HtlDepthExceededError);
      expect(error.kind).toBe("depth-exceeded");
      expect(error.reason).toBe("tree too deep");
      expect(error.column).toBe(2 * depth - 1);
    });
  });

  describe("re-parsing rendered output", () => {
    it("does not round trip html through the parser", () => {
      const html = toHtml('(a "x<y")');
      expect(html).toBe("<a>x&lt;y</a>");
      expect(toHtml(html)).toBe("");
    });
  });
});

describe("parseOrThrow", () => {
  it("returns the tree", () => {
    expect(render(parseOrThrow("(b x)"))).toBe("<b>x</b>");
  });

  it("returns undefined for empty input", () => {
    expect(parseOrThrow("")).toBeUndefined();
  });

  it("throws the parse error", () => {
    expect(() => parseOrThrow(")")).toThrow(HtlParseError);
    expect(() => parseOrThrow(")")).toThrow(
      'unexpected closing paren at line 1, column 1 (character ")")'
    );
  });
});
