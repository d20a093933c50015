// Pure formatting functions — no I/O.

import type { Quote, RefreshResult } from "./domain.ts";
import type { HttpError, ProviderError } from "./market-data.ts";

// --- ANSI escape codes ---

const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Quote formatting ---

export const UNAVAILABLE = "N/A";

// Sub-cent coins need more than four decimals to show anything at all.
const FRACTION_DIGITS = {
  Crypto: { minimumFractionDigits: 4, maximumFractionDigits: 8 },
  Fiat: { minimumFractionDigits: 6, maximumFractionDigits: 6 },
} as const;

export function formatPrice(quote: Quote): string {
  if (quote.status === "Unavailable") return UNAVAILABLE;
  const amount = quote.priceUsd.toLocaleString(
    "en-US",
    FRACTION_DIGITS[quote.asset.kind],
  );
  return `${amount} USD`;
}

export function formatQuoteRow(quote: Quote): string {
  const { symbol, displayName } = quote.asset;
  return `${symbol.padEnd(6)}${displayName.padEnd(24)}${formatPrice(quote)}`;
}

// --- Board formatting ---

export type BoardTab = "all" | "crypto" | "fiat";

const SECTIONS = [
  { kind: "Crypto", tab: "crypto", title: "Cryptocurrencies (Top 20)" },
  { kind: "Fiat", tab: "fiat", title: "Fiat Currencies (Top 10)" },
] as const;

export function formatBoard(result: RefreshResult, tab: BoardTab): string {
  const lines: string[] = [""];

  if (result.partialFailure) {
    const failed = result.failures.length > 0
      ? ` (failed: ${result.failures.map((f) => f.provider).join(", ")})`
      : "";
    lines.push(`${YELLOW}  ⚠ Some prices are unavailable${failed}${RESET}`);
    for (const failure of result.failures) {
      lines.push(formatProviderError(failure));
    }
    lines.push("");
  }

  for (const section of SECTIONS) {
    if (tab !== "all" && tab !== section.tab) continue;
    lines.push(`${BOLD}  ${section.title}${RESET}`);
    for (const quote of result.quotes) {
      if (quote.asset.kind !== section.kind) continue;
      const row = `  ${formatQuoteRow(quote)}`;
      lines.push(quote.status === "Ok" ? row : `${DIM}${row}${RESET}`);
    }
    lines.push("");
  }

  lines.push(
    `  ${DIM}Updated ${new Date(result.completedAt).toISOString()}${RESET}`,
    "",
  );
  return lines.join("\n");
}

// --- Error formatting ---

/** Two lines: provider and title, then a hint. */
export function formatProviderError(error: ProviderError): string {
  const friendly = classifyError(error);
  return [
    `${RED}${BOLD}  ✗ ${error.provider}: ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError({ reason }: ProviderError): ClassifiedError {
  switch (reason._tag) {
    case "NetworkError":
      return {
        title: "Network error",
        hint: "Could not reach the API. Check your internet connection.",
      };
    case "HttpError":
      return classifyHttpError(reason);
    case "ServiceError":
      return {
        title: "Service unavailable",
        hint: reason.message,
      };
    case "ParseError":
      return {
        title: "Unexpected response",
        hint: "The API returned data in an unexpected format.",
      };
  }
}

function classifyHttpError(error: HttpError): ClassifiedError {
  if (error.status === 401 || error.status === 403) {
    return {
      title: "Access denied",
      hint: "The provider rejected the request. Check the API key, if one is set.",
    };
  }
  if (error.status === 429) {
    return {
      title: "Rate limited",
      hint: "Too many requests — wait a moment and try again.",
    };
  }
  if (error.status >= 500 && error.status < 600) {
    return {
      title: "Server error",
      hint: "The provider is having issues. Try again in a few minutes.",
    };
  }
  return {
    title: "HTTP error",
    hint: `HTTP ${error.status}`,
  };
}
