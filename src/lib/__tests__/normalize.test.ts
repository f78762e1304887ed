import { describe, expect, it } from "vitest";

import { dateFormatPriority, parseAmount, parseDate, toFixedAmount } from "@/lib/normalize";

function amount(raw: string): string {
  const res = parseAmount(raw);
  if (!res.ok) throw res.error;
  return toFixedAmount(res.value);
}

function amountError(raw: string): string {
  const res = parseAmount(raw);
  return res.ok ? "" : res.error.message;
}

describe("parseAmount", () => {
  it("strips currency symbols, codes and thousands separators", () => {
    expect(amount("$1,234.56")).toBe("1234.56");
    expect(amount("USD 2,500,000")).toBe("2500000.00");
    expect(amount("€ 750")).toBe("750.00");
  });

  it("reads accounting parentheses and leading minus as negative", () => {
    expect(amount("(5,000.00)")).toBe("-5000.00");
    expect(amount("-1,000")).toBe("-1000.00");
    expect(amount("-$50,000")).toBe("-50000.00");
  });

  it("rounds to cents half up", () => {
    expect(amount("1.005")).toBe("1.01");
    expect(amount(".5")).toBe("0.50");
  });

  it("rejects abbreviated magnitudes instead of scaling them", () => {
    expect(amountError("1.2M")).toBe('Abbreviated magnitude is not accepted: "1.2M"');
    expect(amountError("500K")).toBe('Abbreviated magnitude is not accepted: "500K"');
  });

  it("rejects conflicting negative markers", () => {
    expect(amountError("(-100)")).toBe('Conflicting negative markers: "(-100)"');
  });

  it("rejects malformed grouping and non-numeric text", () => {
    expect(amountError("12,34")).toBe('Not a numeric amount: "12,34"');
    expect(amountError("abc")).toBe('Not a numeric amount: "abc"');
    expect(amountError("  ")).toBe('Empty amount: "  "');
  });
});

describe("parseDate", () => {
  function date(raw: string, order: "MDY" | "DMY" = "MDY"): string {
    const res = parseDate(raw, order);
    if (!res.ok) throw res.error;
    return res.value;
  }

  it("parses ISO dates", () => {
    expect(date("2024-03-15")).toBe("2024-03-15");
    expect(date("2024/3/5")).toBe("2024-03-05");
  });

  it("prefers month-first for ambiguous numeric dates by default", () => {
    expect(date("04/05/2024")).toBe("2024-04-05");
    expect(date("04/05/2024", "DMY")).toBe("2024-05-04");
  });

  it("falls back to the other order when the preferred one is impossible", () => {
    expect(date("15/03/2024")).toBe("2024-03-15");
  });

  it("parses textual months", () => {
    expect(date("March 15, 2024")).toBe("2024-03-15");
    expect(date("15 Mar 2024")).toBe("2024-03-15");
  });

  it("requires a four-digit year", () => {
    const res = parseDate("03/15/24");
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.message).toBe('Date needs a four-digit year: "03/15/24"');
  });

  it("reports unrecognized dates", () => {
    const res = parseDate("2024-13-45");
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.message).toBe('Unrecognized date: "2024-13-45"');
  });

  it("lists the numeric formats of the chosen order first after ISO", () => {
    expect(dateFormatPriority("DMY").slice(0, 3)).toEqual(["yyyy-M-d", "yyyy/M/d", "d/M/yyyy"]);
    expect(dateFormatPriority("MDY").slice(0, 3)).toEqual(["yyyy-M-d", "yyyy/M/d", "M/d/yyyy"]);
  });
});
