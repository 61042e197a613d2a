/**
 * Parsers for the malapi.io HTML pages.
 *
 * The index page is one table: a `th` per behavioral category, and under it
 * a cell holding a nested table whose `.map-item` cells are the API names.
 * Each API has a detail page whose `.content` blocks are, in order:
 * name, description, library, associated attacks, documentation link.
 *
 * These pages are maintained by hand and can change shape at any time, so
 * every structural assumption is checked and reported as a ParseError.
 */

import * as cheerio from "cheerio";
import { ParseError } from "../errors/pescan-error.js";
import type { ApiEntry } from "../reference/types.js";

export interface IndexPage {
  headers: string[];
  /** API names per category, parallel to `headers` */
  columns: string[][];
}

export type ApiDetails = Omit<ApiEntry, "name">;

const DETAIL_BLOCK = {
  description: 1,
  library: 2,
  documentation: 4,
} as const;

export function parseIndexPage(html: string): IndexPage {
  const $ = cheerio.load(html);

  const headers = $("th").toArray().map((el) => $(el).text().trim());
  const columns = $("td > table > tbody").toArray().map((tbody) => {
    const names = $(tbody)
      .find(".map-item")
      .toArray()
      .map((cell) => $(cell).text().trim())
      .filter((name) => name.length > 0);
    return [...new Set(names)];
  });

  if (headers.length === 0 || columns.length === 0) {
    throw new ParseError(
      `Index page has no API categories (found ${headers.length} headers, ${columns.length} columns)`,
    );
  }

  if (headers.length !== columns.length) {
    throw new ParseError(
      `Index page has ${headers.length} category headers but ${columns.length} API columns`,
    );
  }

  const seen = new Set<string>();
  headers.forEach((header, i) => {
    if (!header) {
      throw new ParseError(`Category header ${i + 1} is blank`);
    }
    if (seen.has(header)) {
      throw new ParseError(`Category header "${header}" appears more than once`);
    }
    seen.add(header);
  });

  return { headers, columns };
}

export function parseDetailPage(html: string, name: string): ApiDetails {
  const $ = cheerio.load(html);
  const blocks = $(".content").toArray();

  if (blocks.length <= DETAIL_BLOCK.documentation) {
    throw new ParseError(
      `Detail page for ${name} has ${blocks.length} content blocks, expected at least ${DETAIL_BLOCK.documentation + 1}`,
    );
  }

  const text = (index: number): string | undefined => {
    const value = $(blocks[index]).text().trim();
    return value.length > 0 ? value : undefined;
  };

  const details: ApiDetails = {};
  const description = text(DETAIL_BLOCK.description);
  const library = text(DETAIL_BLOCK.library);
  const documentation = text(DETAIL_BLOCK.documentation)
    ?? $(blocks[DETAIL_BLOCK.documentation]).find("a[href]").attr("href");

  if (description) details.description = description;
  if (library) details.library = library;
  if (documentation) details.documentation = documentation;
  return details;
}
