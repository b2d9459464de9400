import { describe, expect, it } from "vitest";
import { escapeText, extractStringField, previewText, unescapeText } from "./escape";

const SPECIALS = ["\\", '"', "\n", "\r", "\t"];

function* combos(len: number): Generator<string> {
  if (len === 0) {
    yield "";
    return;
  }
  for (const head of SPECIALS) for (const rest of combos(len - 1)) yield head + rest;
}

describe("escapeText", () => {
  it("escapes each special character", () => {
    expect(escapeText('a"b\\c\nd\re\tf')).toBe('a\\"b\\\\c\\nd\\re\\tf');
  });

  it("leaves ordinary text alone", () => {
    expect(escapeText("Prague 2-bed, 6.1% yield")).toBe("Prague 2-bed, 6.1% yield");
  });
});

describe("unescapeText", () => {
  it("inverts escapeText for every mix of the special characters", () => {
    for (let len = 0; len <= 4; len++) {
      for (const s of combos(len)) expect(unescapeText(escapeText(s))).toBe(s);
    }
  });

  it("decodes an escaped backslash followed by n as two characters", () => {
    expect(unescapeText("\\\\n")).toBe("\\n");
  });

  it("keeps unknown escapes and a trailing backslash verbatim", () => {
    expect(unescapeText("\\u0041")).toBe("\\u0041");
    expect(unescapeText("abc\\")).toBe("abc\\");
  });
});

describe("extractStringField", () => {
  it("reads a plain string field", () => {
    expect(extractStringField('{"client_secret":"cs_123"}', "client_secret")).toBe("cs_123");
  });

  it("does not stop at escaped quotes and unescapes the value", () => {
    expect(extractStringField('{"content":"say \\"hi\\"\\n","x":1}', "content")).toBe('say "hi"\n');
  });

  it("allows whitespace around the colon", () => {
    expect(extractStringField('{"content" :  "spaced"}', "content")).toBe("spaced");
  });

  it("skips occurrences whose value is not a string", () => {
    expect(extractStringField('{"content":5,"other":{"content":"y"}}', "content")).toBe("y");
  });

  it("starts searching at the given offset", () => {
    const text = '{"content":"outer","delta":{"content":"inner"}}';
    expect(extractStringField(text, "content", text.indexOf('"delta"'))).toBe("inner");
  });

  it("returns undefined for missing or unterminated values", () => {
    expect(extractStringField('{"other":"x"}', "content")).toBeUndefined();
    expect(extractStringField('{"content":"abc', "content")).toBeUndefined();
  });
});

describe("previewText", () => {
  it("flattens to one line and truncates", () => {
    expect(previewText("a\nb")).toBe("a\\nb");
    expect(previewText("abcdef", 3)).toBe("abc…");
  });
});
