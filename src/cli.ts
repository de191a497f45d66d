import cron, { ScheduledTask } from "node-cron";
import { parseArgs } from "util";
import { AppConfig, getConfig } from "./config";
import { EneaClient } from "./eneaClient";
import { ConfigError, errorMessage } from "./errors";
import { ExportService } from "./exportService";
import { formatOutageList, formatRegionList } from "./formatter";
import { logger } from "./logger";
import { TelegramService } from "./telegramService";
import { Outage, OutageType, outageTypeName, parseOutageType } from "./types";

export function usage(defaultRegion: string): string {
  return `Usage: enea-outages [options]

Options:
  --type <planned|unplanned>  Type of outage to fetch (default: unplanned)
  --list-regions              List all available regions (oddziały) and exit
  --region <name>             Region to check (default: ${defaultRegion})
  --address <text>            Only show notices mentioning this street or address
  --json <file>               Also write the listing to a JSON file
  --notify                    Send the listing to the configured Telegram chat
  --watch                     Repeat on CRON_PATTERN until interrupted
  -h, --help                  Show this help`;
}

export interface CliOptions {
  outageType: OutageType;
  region: string;
  address?: string;
  listRegions: boolean;
  jsonPath?: string;
  notify: boolean;
  watch: boolean;
  help: boolean;
}

export interface CliDeps {
  client: EneaClient;
  telegram: Pick<TelegramService, "sendOutages"> | null;
  out: (text: string) => void;
}

export function parseCliArgs(
  argv: string[],
  defaultRegion: string = getConfig().defaultRegion
): CliOptions {
  const { values } = parseArgs({
    args: argv,
    allowPositionals: false,
    options: {
      type: { type: "string", default: "unplanned" },
      "list-regions": { type: "boolean", default: false },
      region: { type: "string" },
      address: { type: "string" },
      json: { type: "string" },
      notify: { type: "boolean", default: false },
      watch: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const options: CliOptions = {
    outageType: parseOutageType(values.type ?? "unplanned"),
    region: values.region?.trim() || defaultRegion,
    listRegions: values["list-regions"] ?? false,
    notify: values.notify ?? false,
    watch: values.watch ?? false,
    help: values.help ?? false,
  };

  const address = values.address?.trim();
  if (address) {
    options.address = address;
  }
  if (values.json) {
    options.jsonPath = values.json;
  }

  return options;
}

export function createDeps(
  options: CliOptions,
  appConfig: AppConfig = getConfig()
): CliDeps {
  let telegram: TelegramService | null = null;
  if (options.notify) {
    if (!appConfig.telegram) {
      throw new ConfigError(
        "--notify requires TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID"
      );
    }
    telegram = new TelegramService(appConfig.telegram);
  }

  return {
    client: new EneaClient({ defaultRegion: appConfig.defaultRegion }),
    telegram,
    out: (text) => console.log(text),
  };
}

export async function runCommand(
  options: CliOptions,
  deps: CliDeps
): Promise<void> {
  const { client, out } = deps;

  if (options.listRegions) {
    out("Fetching available regions...");
    const regions = await client.listRegions();
    out(formatRegionList(regions));
    return;
  }

  const typeLabel = outageTypeName(options.outageType).toLowerCase();
  out(`Fetching ${typeLabel} outages for region: ${options.region}...`);

  let outages: Outage[];
  if (options.address) {
    out(`Filtering for address: ${options.address}`);
    outages = await client.listOutagesForAddress(
      options.address,
      options.region,
      options.outageType
    );
  } else {
    outages = await client.listOutages(options.region, options.outageType);
  }

  out("");
  out(formatOutageList(outages));

  if (options.jsonPath) {
    await new ExportService(options.jsonPath).save(outages, {
      region: options.region,
      outageType: options.outageType,
      ...(options.address ? { address: options.address } : {}),
    });
    out(`Saved to ${options.jsonPath}`);
  }

  if (deps.telegram) {
    const context = options.address
      ? { region: options.region, address: options.address }
      : { region: options.region };
    await deps.telegram.sendOutages(outages, context);
  }
}

export function startWatch(
  options: CliOptions,
  deps: CliDeps,
  appConfig: AppConfig = getConfig()
): ScheduledTask {
  if (!cron.validate(appConfig.cronPattern)) {
    throw new ConfigError(`Invalid CRON_PATTERN "${appConfig.cronPattern}"`);
  }

  const cycle = async (): Promise<void> => {
    try {
      await runCommand(options, deps);
    } catch (error) {
      logger.error(`Watch cycle failed: ${errorMessage(error)}`, error);
    }
  };

  const task = cron.schedule(appConfig.cronPattern, () => void cycle(), {
    timezone: appConfig.timezone,
  });

  logger.info(`Scheduler ready with pattern "${appConfig.cronPattern}"`);
  void cycle();

  return task;
}

function stopOnSignals(task: ScheduledTask): void {
  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}. Shutting down scheduler...`);
    task.stop();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

/** Resolves to the process exit code. */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const appConfig = getConfig();
    const options = parseCliArgs(argv, appConfig.defaultRegion);
    if (options.help) {
      console.log(usage(appConfig.defaultRegion));
      return 0;
    }

    if (options.address && options.listRegions) {
      throw new ConfigError("--address cannot be combined with --list-regions");
    }

    const deps = createDeps(options, appConfig);
    if (options.watch) {
      stopOnSignals(startWatch(options, deps, appConfig));
      return 0;
    }

    await runCommand(options, deps);
    return 0;
  } catch (error) {
    console.log(`An error occurred: ${errorMessage(error)}`);
    return 1;
  }
}
