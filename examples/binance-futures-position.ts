/**
 * Binance Futures Position: prints the BTCUSDT perpetual position and
 * every open futures order, with a 10 second timeout on each call.
 *
 * Reads BINANCE_API_KEY / BINANCE_API_SECRET. CEXWIRE_BINANCE_FUTURES_BASE_URL
 * points the futures calls at a testnet.
 * Run: npx tsx examples/binance-futures-position.ts
 */

import { ExchangeClient, MarketKind, createLogger, market } from "../src/index.js";

const logger = createLogger({ level: "info" });
const client = ExchangeClient.fromEnv("binance", { logger });
const perpetual = market("BTC", "USDT", MarketKind.Swap);

const positions = await client.run(
	"getPosition",
	{ market: perpetual },
	{ signal: AbortSignal.timeout(10_000) },
);
if (!positions.ok) {
	logger.error({ err: positions.error }, "position query failed");
	process.exit(1);
}
for (const position of positions.value) {
	logger.info(
		{
			side: position.side,
			quantity: position.quantity.toString(),
			entryPrice: position.entryPrice.toString(),
			unrealizedPnl: position.unrealizedPnl.toString(),
		},
		"position",
	);
}

const orders = await client.run(
	"getAllOrders",
	{ kind: MarketKind.Swap },
	{ signal: AbortSignal.timeout(10_000) },
);
if (orders.ok) {
	for (const order of orders.value) {
		logger.info({ symbol: order.symbol, orderId: order.orderId, side: order.side }, "open order");
	}
}
