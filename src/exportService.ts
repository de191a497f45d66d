import fs from "fs-extra";
import path from "path";
import { serializeOutage } from "./formatter";
import { logger } from "./logger";
import { Outage, OutageExport, OutageType, outageTypeName } from "./types";

export interface ExportMeta {
  region: string;
  outageType: OutageType;
  address?: string;
}

export function buildExport(
  outages: Outage[],
  meta: ExportMeta,
  fetchedAt: Date = new Date()
): OutageExport {
  const data: OutageExport = {
    region: meta.region,
    outageType: outageTypeName(meta.outageType),
    fetchedAt: fetchedAt.toISOString(),
    outages: outages.map(serializeOutage),
  };

  if (meta.address) {
    data.address = meta.address;
  }

  return data;
}

/** Writes one listing to a JSON file, replacing whatever was there. */
export class ExportService {
  constructor(private readonly outputPath: string) {}

  async save(outages: Outage[], meta: ExportMeta): Promise<OutageExport> {
    const data = buildExport(outages, meta);
    await fs.ensureDir(path.dirname(this.outputPath));
    await fs.writeJSON(this.outputPath, data, { spaces: 2 });
    logger.info(`Saved ${outages.length} outages to ${this.outputPath}`);
    return data;
  }
}
