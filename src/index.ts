import cron from "node-cron";
import { BinanceExchange, createRestClient } from "./clients/binance";
import { sendTelegramMessage, telegramNotifier } from "./clients/telegram";
import { config } from "./config";
import { PositionStore } from "./services/positionStore";
import { SettingsStore } from "./services/settingsStore";
import { SignalHistory } from "./services/signalHistory";
import { createTradeLogger } from "./services/tradeLogger";
import { TradingEngine } from "./services/tradingEngine";
import { logger } from "./utils/logger";

const exchange = new BinanceExchange(createRestClient());
const settings = new SettingsStore();
const engine = new TradingEngine({
	marketData: exchange,
	exchange,
	settings,
	notifier: telegramNotifier,
	signalHistory: new SignalHistory(),
	tradeLogger: createTradeLogger(),
	positionStore: new PositionStore(),
});

async function runSignalJob(): Promise<void> {
	try {
		await engine.runAutoCycle(config.strategy.symbols);
	} catch (error) {
		logger.error({ error }, "Signal job failed");
		await sendTelegramMessage(`Signal job failed: ${String(error)}`).catch((err) =>
			logger.warn({ err }, "Failed to send Telegram message"),
		);
	}
}

function scheduleJobs() {
	cron.schedule(config.scheduling.signalCron, runSignalJob, {
		timezone: config.scheduling.timezone,
	});
}

function registerShutdown() {
	const shutdown = (signal: string) => {
		logger.info({ signal }, "Shutting down");
		engine.stop();
		process.exit(0);
	};
	process.once("SIGINT", () => shutdown("SIGINT"));
	process.once("SIGTERM", () => shutdown("SIGTERM"));
}

async function bootstrap() {
	logger.info(
		{ symbols: config.strategy.symbols, testnet: config.binance.testnet },
		"Starting futures decision engine",
	);
	await settings.load();
	const restored = await engine.executor.restore();
	const symbols = new Set([...config.strategy.symbols, ...restored.map((p) => p.symbol)]);
	for (const symbol of symbols) {
		await engine.executor.reconcile(symbol);
	}
	engine.start();
	scheduleJobs();
	registerShutdown();
	logger.info(engine.getStatus(), "Engine ready");
}

bootstrap().catch((err) => {
	logger.error({ err }, "Fatal error");
	process.exitCode = 1;
});
