// The fixed watch-list: top 20 crypto assets by market cap, then 10 fiat
// currencies. Order here is the display order.

import type { Asset } from "./domain.ts";

const crypto = (symbol: string, displayName: string, sourceId: string): Asset => ({
  symbol,
  kind: "Crypto",
  displayName,
  sourceId,
});

const fiat = (symbol: string, displayName: string): Asset => ({
  symbol,
  kind: "Fiat",
  displayName,
  sourceId: symbol,
});

export const CRYPTO_WATCH_LIST: ReadonlyArray<Asset> = [
  crypto("BTC", "Bitcoin", "bitcoin"),
  crypto("ETH", "Ethereum", "ethereum"),
  crypto("USDT", "Tether", "tether"),
  crypto("XRP", "XRP", "ripple"),
  crypto("BNB", "BNB", "binancecoin"),
  crypto("SOL", "Solana", "solana"),
  crypto("USDC", "USD Coin", "usd-coin"),
  crypto("DOGE", "Dogecoin", "dogecoin"),
  crypto("TRX", "TRON", "tron"),
  crypto("ADA", "Cardano", "cardano"),
  crypto("LINK", "Chainlink", "chainlink"),
  crypto("AVAX", "Avalanche", "avalanche-2"),
  crypto("XLM", "Stellar", "stellar"),
  crypto("SUI", "Sui", "sui"),
  crypto("TON", "Toncoin", "the-open-network"),
  crypto("SHIB", "Shiba Inu", "shiba-inu"),
  crypto("HBAR", "Hedera", "hedera-hashgraph"),
  crypto("DOT", "Polkadot", "polkadot"),
  crypto("BCH", "Bitcoin Cash", "bitcoin-cash"),
  crypto("LTC", "Litecoin", "litecoin"),
];

export const FIAT_WATCH_LIST: ReadonlyArray<Asset> = [
  fiat("EUR", "Euro"),
  fiat("JPY", "Japanese Yen"),
  fiat("GBP", "British Pound"),
  fiat("AUD", "Australian Dollar"),
  fiat("CAD", "Canadian Dollar"),
  fiat("CHF", "Swiss Franc"),
  fiat("CNY", "Chinese Yuan"),
  fiat("HKD", "Hong Kong Dollar"),
  fiat("NZD", "New Zealand Dollar"),
  fiat("BRL", "Brazilian Real"),
];

export const WATCH_LIST: ReadonlyArray<Asset> = [
  ...CRYPTO_WATCH_LIST,
  ...FIAT_WATCH_LIST,
];
