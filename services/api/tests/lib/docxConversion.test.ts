import { Document, HeadingLevel, Packer, Paragraph } from "docx";
import { describe, expect, it } from "vitest";
import { anonymizeDocument } from "../../src/lib/anonymizer";
import { parseReportDocx } from "../../src/lib/docx";

function report(paragraphs: Paragraph[]): Promise<Buffer> {
  const document = new Document({
    styles: {
      paragraphStyles: [
        { id: "Heading7", name: "heading 7", basedOn: "Normal", next: "Normal", quickFormat: true },
        { id: "HeadingCustom", name: "Heading Appendix", basedOn: "Normal", next: "Normal" }
      ]
    },
    sections: [{ children: paragraphs }]
  });
  return Packer.toBuffer(document);
}

describe("parseReportDocx with a real Word file", () => {
  it("reads heading levels beyond 6 and keeps empty paragraphs", async () => {
    const buffer = await report([
      new Paragraph({ text: "Report", heading: HeadingLevel.TITLE }),
      new Paragraph({ text: "Clinical Summary and Impression", heading: HeadingLevel.HEADING_1 }),
      new Paragraph({ text: "Name: Lea Avatar" }),
      new Paragraph({}),
      new Paragraph({ text: "he is calm" }),
      new Paragraph({ text: "Details", style: "Heading7" }),
      new Paragraph({ text: "she left" })
    ]);

    const document = await parseReportDocx(buffer);

    expect(document.blocks).toEqual([
      { text: "Report", style: { isHeading: true, headingLevel: 0 } },
      { text: "Clinical Summary and Impression", style: { isHeading: true, headingLevel: 1 } },
      { text: "Name: Lea Avatar", style: { isHeading: false } },
      { text: "", style: { isHeading: false } },
      { text: "he is calm", style: { isHeading: false } },
      { text: "Details", style: { isHeading: true, headingLevel: 7 } },
      { text: "she left", style: { isHeading: false } }
    ]);
    expect(anonymizeDocument(document)).toBe(
      "Clinical Summary and Impression\nName: [FIRST_NAME] [LAST_NAME]\n\nhe/she is calm"
    );
  });

  it("treats any style named Heading... as a section boundary", async () => {
    const buffer = await report([
      new Paragraph({ text: "Name: Lea Avatar" }),
      new Paragraph({ text: "Mental Health Assessment", heading: HeadingLevel.HEADING_2 }),
      new Paragraph({ text: "kept" }),
      new Paragraph({ text: "Appendix", style: "HeadingCustom" }),
      new Paragraph({ text: "dropped" })
    ]);

    const document = await parseReportDocx(buffer);

    expect(document.blocks.filter((b) => b.style.isHeading).map((b) => [b.text, b.style.headingLevel])).toEqual([
      ["Mental Health Assessment", 2],
      ["Appendix", undefined]
    ]);
    expect(anonymizeDocument(document)).toBe("Mental Health Assessment\nkept");
  });
});
