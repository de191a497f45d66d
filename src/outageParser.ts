import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import { normalizeDateInfo } from "./dateParser";
import { errorMessage, OutageParseError } from "./errors";
import { logger } from "./logger";
import { Outage } from "./types";

export const BLOCK_SELECTOR = "div.unpl.block.info";
const CONTAINER_SELECTOR = ".unpl_cont";
const REGION_SELECTOR = "h4.title_";
const DESCRIPTION_SELECTOR = "p.description";
const DATE_INFO_SELECTOR = "p.bold.subtext";
const REGION_SELECT_SELECTOR = "select#oddzial";

export const UNKNOWN_REGION = "Nieznany obszar";
export const NO_DESCRIPTION = "Brak opisu";

function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export class OutageParser {
  /** Outage notice blocks in document order; empty when the page has none. */
  extractBlocks($: cheerio.CheerioAPI): Element[] {
    return $(BLOCK_SELECTOR).toArray();
  }

  /**
   * Reads one notice block. Date errors propagate so callers decide whether
   * a bad block aborts anything.
   */
  parseBlock($: cheerio.CheerioAPI, block: Element): Outage {
    const $block = $(block);

    const region = this.pickText($block, REGION_SELECTOR) ?? UNKNOWN_REGION;
    const description =
      this.pickText($block, DESCRIPTION_SELECTOR) ?? NO_DESCRIPTION;
    const dateInfo = this.pickText($block, DATE_INFO_SELECTOR) ?? "";

    const { startTime, endTime } = normalizeDateInfo(dateInfo);

    return Object.freeze({ region, description, startTime, endTime });
  }

  /** Parses every block of a page, skipping the ones whose date is unreadable. */
  parseOutages(html: string): Outage[] {
    const $ = cheerio.load(html);
    const blocks = this.extractBlocks($);

    if (blocks.length === 0) {
      if ($(CONTAINER_SELECTOR).length === 0) {
        logger.warn(
          `No ${CONTAINER_SELECTOR} container found; the page layout may have changed`
        );
      } else {
        logger.debug("Outage container is present but holds no notices");
      }
      return [];
    }

    logger.debug(`Found ${blocks.length} outage block(s)`);

    const outages: Outage[] = [];
    blocks.forEach((block, index) => {
      try {
        outages.push(this.parseBlock($, block));
      } catch (error) {
        if (!(error instanceof OutageParseError)) {
          throw error;
        }
        logger.warn(
          `Skipping outage block #${index + 1}: ${errorMessage(error)} in block: ${cleanText($(block).text())}`
        );
      }
    });

    return outages;
  }

  /** Non-empty option values of the region selector, in document order. */
  parseRegions(html: string): string[] {
    const $ = cheerio.load(html);
    const select = $(REGION_SELECT_SELECTOR);

    if (select.length === 0) {
      logger.warn(
        `Region selector ${REGION_SELECT_SELECTOR} not found; the page layout may have changed`
      );
      return [];
    }

    return select
      .find("option")
      .toArray()
      .map((option) => $(option).attr("value"))
      .filter((value): value is string => value !== undefined && value !== "");
  }

  private pickText(
    $block: cheerio.Cheerio<Element>,
    selector: string
  ): string | undefined {
    const node = $block.find(selector).first();
    if (node.length === 0) {
      return undefined;
    }
    return cleanText(node.text());
  }
}

/** Case-insensitive substring match on the description only. */
export function filterByAddress(outages: Outage[], address: string): Outage[] {
  const needle = address.toLocaleLowerCase("pl");
  return outages.filter((outage) =>
    outage.description.toLocaleLowerCase("pl").includes(needle)
  );
}
