export { EneaClient } from "./eneaClient";
export type { EneaClientOptions } from "./eneaClient";
export { HttpDocumentFetcher, buildPageUrl } from "./httpFetcher";
export {
  OutageParser,
  filterByAddress,
  BLOCK_SELECTOR,
  UNKNOWN_REGION,
  NO_DESCRIPTION,
} from "./outageParser";
export { normalizeDateInfo, monthNumber, MONTHS, DATE_PATTERNS } from "./dateParser";
export {
  OutageParseError,
  DateFormatError,
  UnknownMonthError,
  HttpStatusError,
  ConfigError,
} from "./errors";
export { OutageType, parseOutageType } from "./types";
export type {
  Outage,
  OutageWindow,
  DocumentFetcher,
  SerializedOutage,
  OutageExport,
} from "./types";
export { formatOutageList, formatDateTime, serializeOutage } from "./formatter";
