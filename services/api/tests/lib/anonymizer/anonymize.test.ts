import { describe, expect, it } from "vitest";
import {
  anonymizeBlocks,
  anonymizeDocument,
  anonymizeText,
  getDiagnosticBlocks,
  toSectionSet
} from "../../../src/lib/anonymizer";
import { NotFoundError } from "../../../src/lib/errors";
import { doc, heading, para } from "./helpers";

const identity = { firstName: "Lea", lastName: "Avatar" };

describe("anonymizeText", () => {
  it("replaces names regardless of case and keeps trailing punctuation", () => {
    expect(anonymizeText("LEA's report. Avatar, lea.", identity)).toBe("[FIRST_NAME]'s report. [LAST_NAME], [FIRST_NAME].");
  });

  it("writes gendered words as alternatives", () => {
    expect(anonymizeText("Lea went home with her son", identity)).toBe("[FIRST_NAME] went home with his/her son/daughter");
    expect(anonymizeText("His mother is a woman; the boy and girl", identity)).toBe(
      "His/Her mother is a man/woman; the boy/girl and boy/girl"
    );
  });

  it("skips an empty last name", () => {
    expect(anonymizeText("Lea and Avatar", { firstName: "Lea", lastName: "" })).toBe("[FIRST_NAME] and Avatar");
  });
});

describe("anonymizeBlocks", () => {
  it("returns new blocks and leaves the input untouched", () => {
    const blocks = [para("he is here")];
    const out = anonymizeBlocks(blocks, identity);
    expect(out).toEqual([para("he/she is here")]);
    expect(blocks[0]?.text).toBe("he is here");
    expect(out[0]?.style).not.toBe(blocks[0]?.style);
  });
});

describe("anonymizeDocument", () => {
  it("anonymizes the diagnostic section of a report", () => {
    const d = doc(
      heading("Title", 0),
      heading("clinical summary and impression", 1),
      para("Name: Lea Avatar"),
      para("He she herself man")
    );
    expect(anonymizeDocument(d)).toBe(
      "clinical summary and impression\nName: [FIRST_NAME] [LAST_NAME]\nHe/She he/she himself/herself man/woman"
    );
  });

  it("finds the name outside the retained sections", () => {
    const d = doc(para("Name: Lea Avatar"), heading("Mental Health Assessment"), para("Lea is calm."));
    expect(anonymizeDocument(d)).toBe("Mental Health Assessment\n[FIRST_NAME] is calm.");
  });

  it("throws without a name line", () => {
    const d = doc(heading("Clinical Summary and Impression"), para("he is fine"));
    expect(() => anonymizeDocument(d)).toThrow(NotFoundError);
  });

  it("returns an empty string when no section is retained", () => {
    const d = doc(para("Name: Lea Avatar"), heading("Background"), para("he is fine"));
    expect(anonymizeDocument(d)).toBe("");
  });

  it("uses the configured sections", () => {
    const d = doc(para("Name: Lea Avatar"), heading("Plan"), para("see her weekly"));
    expect(anonymizeDocument(d, { sections: toSectionSet(["plan"]) })).toBe("Plan\nsee his/her weekly");
  });

  it("extracting an already extracted document keeps its blocks in order", () => {
    const d = doc(heading("Intro"), heading("DSM-5 Diagnostic Summary"), para("one"), para("two"), heading("Other"));
    const once = getDiagnosticBlocks(d);
    expect(getDiagnosticBlocks(doc(...once))).toEqual(once);
  });
});
