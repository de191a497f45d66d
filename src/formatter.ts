import { Outage, SerializedOutage } from "./types";

const SEPARATOR = "-".repeat(40);

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

function formatDay(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function formatClock(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/** "2025-12-08 08:00", in local time like the notices themselves */
export function formatDateTime(date: Date): string {
  return `${formatDay(date)} ${formatClock(date)}`;
}

export function serializeOutage(outage: Outage): SerializedOutage {
  return {
    region: outage.region,
    description: outage.description,
    startTime: outage.startTime
      ? `${formatDay(outage.startTime)}T${formatClock(outage.startTime)}`
      : null,
    endTime: `${formatDay(outage.endTime)}T${formatClock(outage.endTime)}`,
  };
}

/**
 * Plain-text listing for the terminal.
 */
export function formatOutageList(outages: Outage[]): string {
  if (outages.length === 0) {
    return "No outages found for the specified criteria.";
  }

  const lines: string[] = [`Found ${outages.length} outage notice(s):`];
  for (const outage of outages) {
    lines.push(SEPARATOR);
    lines.push(`  Obszar: ${outage.region}`);
    lines.push(`  Opis: ${outage.description}`);
    if (outage.startTime) {
      lines.push(`  Początek: ${formatDateTime(outage.startTime)}`);
    }
    lines.push(`  Koniec:   ${formatDateTime(outage.endTime)}`);
  }
  lines.push(SEPARATOR);

  return lines.join("\n");
}

export function formatRegionList(regions: string[]): string {
  if (regions.length === 0) {
    return "Could not retrieve regions.";
  }
  return ["Available regions:", ...regions.map((region) => `- ${region}`)].join(
    "\n"
  );
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

export interface MessageContext {
  region: string;
  address?: string;
}

/** Telegram message body (parse_mode HTML). */
export function formatTelegramMessage(
  outages: Outage[],
  context: MessageContext
): string {
  const lines: string[] = [];

  lines.push("🔌 <b>Wyłączenia prądu</b>");
  lines.push(`📍 <b>${escapeHtml(context.region)}</b>`);
  if (context.address) {
    lines.push(`🏠 ${escapeHtml(context.address)}`);
  }

  if (outages.length === 0) {
    lines.push("\n✅ <b>Brak wyłączeń</b>");
    return lines.join("\n");
  }

  for (const outage of outages) {
    const timeRange = outage.startTime
      ? `${formatDateTime(outage.startTime)} - ${formatClock(outage.endTime)}`
      : `do ${formatDateTime(outage.endTime)}`;

    lines.push("");
    lines.push(`⏰ <b>${timeRange}</b>`);
    lines.push(`🗺️ ${escapeHtml(outage.region)}`);
    lines.push(escapeHtml(outage.description));
  }

  return lines.join("\n");
}
