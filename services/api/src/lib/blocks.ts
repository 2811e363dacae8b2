import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { ReportBlock, ReportDocument } from "./anonymizer";

export function buildDocumentFromHtml(html: string): ReportDocument {
  const $ = cheerio.load(`<body>${html}</body>`);
  const blocks: ReportBlock[] = [];
  visitChildren($, $("body").first(), blocks);
  return { blocks };
}

function visitChildren($: CheerioAPI, parent: Cheerio<Element>, out: ReportBlock[]) {
  parent.children().each((_, el) => {
    const node = $(el);
    const tag = el.tagName.toLowerCase();

    const heading = /^h([1-6])$/.exec(tag);
    if (heading) {
      out.push({ text: blockText(node), style: { isHeading: true, headingLevel: headingLevel(node, Number(heading[1])) } });
      return;
    }
    if (tag === "p") {
      out.push({ text: blockText(node), style: { isHeading: false } });
      return;
    }
    if (tag === "ul" || tag === "ol") {
      node.children("li").each((__, li) => visitListItem($, $(li), out));
      return;
    }
    if (tag === "table") return;
    visitChildren($, node, out);
  });
}

// undefined for a custom heading style whose level is not known
function headingLevel(node: Cheerio<Element>, tagLevel: number): number | undefined {
  if (node.hasClass("title")) return 0;
  const deep = /(?:^|\s)level-([7-9])(?:\s|$)/.exec(node.attr("class") ?? "");
  if (deep) return Number(deep[1]);
  if (node.hasClass("heading")) return undefined;
  return tagLevel;
}

function visitListItem($: CheerioAPI, li: Cheerio<Element>, out: ReportBlock[]) {
  const own = li.clone();
  own.find("ul,ol").remove();
  out.push({ text: blockText(own), style: { isHeading: false } });
  li.children("ul,ol").each((_, list) => {
    $(list)
      .children("li")
      .each((__, nested) => visitListItem($, $(nested), out));
  });
}

function blockText(node: Cheerio<Element>): string {
  const clone = node.clone();
  clone.find("br").replaceWith("\n");
  return clone.text().replace(/\u00a0/g, " ");
}

