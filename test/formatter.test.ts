import { describe, expect, it } from "vitest";

import {
  escapeHtml,
  formatDateTime,
  formatOutageList,
  formatRegionList,
  formatTelegramMessage,
  serializeOutage,
} from "../src/formatter";
import { Outage } from "../src/types";

const PLANNED: Outage = {
  region: "Gmina Suchy Las",
  description: "Planned works on Zakopiańska 12-20.",
  startTime: new Date(2025, 11, 8, 8, 0),
  endTime: new Date(2025, 11, 8, 16, 0),
};

const UNPLANNED: Outage = {
  region: "Test Area",
  description: "Cable <b>fault</b> & repair",
  startTime: null,
  endTime: new Date(2025, 10, 29, 14, 30),
};

describe("formatter", () => {
  it("formats local timestamps with zero padding", () => {
    expect(formatDateTime(new Date(2026, 0, 2, 6, 5))).toBe("2026-01-02 06:05");
  });

  it("prints the terminal listing with a start line only for planned notices", () => {
    expect(formatOutageList([PLANNED, UNPLANNED])).toBe(
      [
        "Found 2 outage notice(s):",
        "----------------------------------------",
        "  Obszar: Gmina Suchy Las",
        "  Opis: Planned works on Zakopiańska 12-20.",
        "  Początek: 2025-12-08 08:00",
        "  Koniec:   2025-12-08 16:00",
        "----------------------------------------",
        "  Obszar: Test Area",
        "  Opis: Cable <b>fault</b> & repair",
        "  Koniec:   2025-11-29 14:30",
        "----------------------------------------",
      ].join("\n")
    );
  });

  it("prints a notice for empty listings", () => {
    expect(formatOutageList([])).toBe("No outages found for the specified criteria.");
    expect(formatRegionList([])).toBe("Could not retrieve regions.");
  });

  it("prints regions as a bullet list", () => {
    expect(formatRegionList(["Poznań", "Bydgoszcz"])).toBe(
      "Available regions:\n- Poznań\n- Bydgoszcz"
    );
  });

  it("serializes outages with minute precision", () => {
    expect(serializeOutage(PLANNED)).toEqual({
      region: "Gmina Suchy Las",
      description: "Planned works on Zakopiańska 12-20.",
      startTime: "2025-12-08T08:00",
      endTime: "2025-12-08T16:00",
    });
    expect(serializeOutage(UNPLANNED).startTime).toBeNull();
  });

  it("escapes markup characters for Telegram HTML", () => {
    expect(escapeHtml("a < b & c > d")).toBe("a &lt; b &amp; c &gt; d");
  });

  it("builds the Telegram message for a filtered listing", () => {
    expect(
      formatTelegramMessage([PLANNED, UNPLANNED], { region: "Poznań", address: "Zakopiańska" })
    ).toBe(
      [
        "🔌 <b>Wyłączenia prądu</b>",
        "📍 <b>Poznań</b>",
        "🏠 Zakopiańska",
        "",
        "⏰ <b>2025-12-08 08:00 - 16:00</b>",
        "🗺️ Gmina Suchy Las",
        "Planned works on Zakopiańska 12-20.",
        "",
        "⏰ <b>do 2025-11-29 14:30</b>",
        "🗺️ Test Area",
        "Cable &lt;b&gt;fault&lt;/b&gt; &amp; repair",
      ].join("\n")
    );
  });

  it("says so when there is nothing to report", () => {
    expect(formatTelegramMessage([], { region: "Poznań" })).toBe(
      "🔌 <b>Wyłączenia prądu</b>\n📍 <b>Poznań</b>\n\n✅ <b>Brak wyłączeń</b>"
    );
  });
});
