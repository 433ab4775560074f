/**
 * Compare Orderbooks: best bid/ask for one market on every exchange that
 * serves it, through the exchange-neutral getOrderbook capability.
 *
 * Public endpoints only; no keys needed.
 * Run: npx tsx examples/compare-orderbooks.ts
 */

import { EXCHANGE_IDS, ExchangeClient, createLogger, market } from "../src/index.js";

const logger = createLogger({ level: "info" });

// Upbit and Bithumb quote in KRW; the rest in USDT.
const QUOTES = { binance: "USDT", okx: "USDT", cryptocom: "USDT", upbit: "KRW", bithumb: "KRW" } as const;

for (const exchange of EXCHANGE_IDS) {
	const client = ExchangeClient.create(exchange, { logger });
	if (!client.supports("getOrderbook")) continue;

	const result = await client.run("getOrderbook", { market: market("BTC", QUOTES[exchange]), ticks: 5 });
	if (!result.ok) {
		logger.warn({ exchange, err: result.error }, "orderbook failed");
		continue;
	}

	const bid = result.value.bids[0];
	const ask = result.value.asks[0];
	logger.info(
		{ exchange, bid: bid?.price.toString(), ask: ask?.price.toString(), levels: result.value.bids.length },
		"top of book",
	);
}
