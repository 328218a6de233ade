#!/usr/bin/env node

import process from "node:process";
import {
	createLogger,
	errorMessage,
	formatTimeframe,
	loadFeedConfig,
	parseTimeframe,
} from "@barline/core";
import { BarStore, SessionSchedule } from "@barline/data";
import { CcxtTransportClient } from "@barline/exchange-ccxt";
import { parseCliArgs, resolveFeedCliOptions } from "./cliArgs";
import { runPullLoop } from "./pullLoop";

const logger = createLogger("feed-cli");

const USAGE = `Usage:
  npm run feed -- [dataname] [options]

Options (all optional):
  --profile <name>        Feed profile under config/feeds (default: FEED_PROFILE or "default")
  --dataname <name>       Instrument, e.g. BINANCE:BTC/USDT
  --timeframe <tf>        Bar timeframe, e.g. 1m, 5m, 1h, 1d
  --live                  Stream live bars
  --history               Replay the configured date range and exit
  --idle-ms <ms>          Sleep between loads while no bar is ready (default 1000)
  --envPath <path>        Custom .env path
  --configDir <path>      Custom config directory
  --help                  Show this message
`;

const main = async (): Promise<void> => {
	const options = resolveFeedCliOptions(parseCliArgs(process.argv.slice(2)));
	if (options.help) {
		console.log(USAGE);
		return;
	}

	const config = loadFeedConfig({
		profile: options.profile,
		configDir: options.configDir,
		envPath: options.envPath,
	});
	const dataname = options.dataname ?? config.feed.dataname;
	const timeframe = options.timeframe
		? parseTimeframe(options.timeframe)
		: config.feed.timeframe;
	const liveBars = options.liveBars ?? config.feed.liveBars;
	const { provider } = config;

	logger.info("cli_starting", {
		profile: config.profile,
		provider: provider.name,
		exchangeId: provider.exchangeId,
		dataname,
		timeframe: formatTimeframe(timeframe),
		liveBars,
		scheduled: Boolean(config.schedule),
	});

	const transport = new CcxtTransportClient({
		exchangeId: provider.exchangeId,
		timeZone: provider.timeZone,
		apiKey: provider.credentials.apiKey,
		secret: provider.credentials.apiSecret,
		streamEndpoint: provider.streamEndpoint,
	});
	const store = new BarStore({ providers: { [provider.name]: transport } });
	store.start();

	const feed = store.createFeed({
		name: dataname,
		dataname,
		providerName: provider.name,
		timeframe,
		session: config.feed.session,
		fromDate: config.feed.fromDate,
		toDate: config.feed.toDate,
		liveBars,
		schedule: config.schedule ? new SessionSchedule(config.schedule) : undefined,
	});

	const controller = new AbortController();
	const onSigint = (): void => {
		logger.info("cli_interrupted", { feed: feed.name });
		controller.abort();
	};
	process.once("SIGINT", onSigint);

	try {
		await feed.start();
		const result = await runPullLoop({
			feed,
			idleMs: options.idleMs,
			signal: controller.signal,
			onBar: (bar) => logger.info("feed_bar", { feed: feed.name, ...bar }),
			onNotification: (notification) =>
				logger.info("feed_status", { ...notification }),
		});
		logger.info("cli_finished", { ...result, ...feed.reconcilerStats });
	} finally {
		process.off("SIGINT", onSigint);
		await store.stop();
		for (const notification of feed.drainNotifications()) {
			logger.info("feed_status", { ...notification });
		}
		for (const notification of store.getNotifications()) {
			logger.debug("store_notification", { ...notification });
		}
	}
};

main().catch((error) => {
	logger.error("cli_unhandled_error", {
		message: errorMessage(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
