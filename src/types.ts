export enum OutageType {
  PLANNED = "planowane",
  UNPLANNED = "awarie",
}

export interface Outage {
  readonly region: string;
  readonly description: string;
  readonly startTime: Date | null; // Only planned notices publish a start
  readonly endTime: Date;
}

export interface OutageWindow {
  startTime: Date | null;
  endTime: Date;
}

/**
 * Supplies the raw HTML of an outage page. The HTTP implementation lives in
 * httpFetcher.ts; tests swap in an in-memory one.
 */
export interface DocumentFetcher {
  fetchDocument(region: string, outageType: OutageType): Promise<string>;
}

export interface TelegramSettings {
  botToken: string;
  chatId: string;
}

export interface SerializedOutage {
  region: string;
  description: string;
  startTime: string | null; // Format: "YYYY-MM-DDTHH:mm"
  endTime: string;
}

export interface OutageExport {
  region: string;
  outageType: keyof typeof OutageType;
  address?: string;
  fetchedAt: string;
  outages: SerializedOutage[];
}

export function parseOutageType(value: string): OutageType {
  switch (value.trim().toLowerCase()) {
    case "planned":
      return OutageType.PLANNED;
    case "unplanned":
      return OutageType.UNPLANNED;
    default:
      throw new Error(
        `Unknown outage type "${value}" (expected "planned" or "unplanned")`
      );
  }
}

export function outageTypeName(outageType: OutageType): keyof typeof OutageType {
  return outageType === OutageType.PLANNED ? "PLANNED" : "UNPLANNED";
}
