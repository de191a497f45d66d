import { getConfig } from "./config";
import { HttpDocumentFetcher } from "./httpFetcher";
import { logger } from "./logger";
import { filterByAddress, OutageParser } from "./outageParser";
import { DocumentFetcher, Outage, OutageType } from "./types";

export interface EneaClientOptions {
  fetcher?: DocumentFetcher;
  parser?: OutageParser;
  defaultRegion?: string;
}

export class EneaClient {
  private readonly fetcher: DocumentFetcher;
  private readonly parser: OutageParser;
  private readonly defaultRegion: string;

  constructor(options: EneaClientOptions = {}) {
    this.fetcher = options.fetcher ?? new HttpDocumentFetcher();
    this.parser = options.parser ?? new OutageParser();
    this.defaultRegion = options.defaultRegion ?? getConfig().defaultRegion;
  }

  /**
   * All current notices for a region, in the order the page lists them.
   * Blocks with an unreadable date are logged and dropped.
   */
  async listOutages(
    region: string = this.defaultRegion,
    outageType: OutageType = OutageType.UNPLANNED
  ): Promise<Outage[]> {
    logger.info(`Fetching ${outageType} notices for ${region}`);
    const html = await this.fetcher.fetchDocument(region, outageType);
    const outages = this.parser.parseOutages(html);
    logger.info(`Parsed ${outages.length} outage(s) for ${region}`);
    return outages;
  }

  /**
   * Notices whose description mentions `address`. The site has no
   * address-level query, so the whole region is fetched and filtered here.
   */
  async listOutagesForAddress(
    address: string,
    region: string = this.defaultRegion,
    outageType: OutageType = OutageType.UNPLANNED
  ): Promise<Outage[]> {
    const outages = await this.listOutages(region, outageType);
    return filterByAddress(outages, address);
  }

  /** Every page carries the same selector, so any region works as the source. */
  async listRegions(): Promise<string[]> {
    const html = await this.fetcher.fetchDocument(
      this.defaultRegion,
      OutageType.UNPLANNED
    );
    return this.parser.parseRegions(html);
  }
}
