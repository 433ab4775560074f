/**
 * Binance Limit Order: places a far-from-market limit buy, lists open
 * orders and cancels it again.
 *
 * Reads BINANCE_API_KEY / BINANCE_API_SECRET. Point CEXWIRE_BINANCE_BASE_URL
 * at a testnet before running this against real keys.
 * Run: npx tsx examples/binance-limit-order.ts
 */

import { Decimal, ExchangeClient, createLogger, market } from "../src/index.js";

const logger = createLogger({ level: "debug" });
const client = ExchangeClient.fromEnv("binance", { logger });
const btc = market("BTC", "USDT");

const placed = await client.run("placeOrder", {
	market: btc,
	order: {
		type: "limit",
		side: "buy",
		quantity: Decimal.from("0.001"),
		price: Decimal.from("1000"),
		timeInForce: "GTC",
	},
});
if (!placed.ok) {
	logger.error({ err: placed.error }, "place failed");
	process.exit(1);
}
logger.info({ orderId: placed.value.orderId }, "order placed");

const open = await client.run("getOrders", { market: btc });
if (open.ok) {
	for (const order of open.value) {
		logger.info({ orderId: order.orderId, remaining: order.remaining?.toString() }, "open order");
	}
}

const cancelled = await client.run("cancelOrder", { market: btc, orderId: placed.value.orderId });
if (!cancelled.ok) {
	logger.error({ err: cancelled.error }, "cancel failed");
	process.exit(1);
}
logger.info({ orderId: cancelled.value.orderId }, "order cancelled");
