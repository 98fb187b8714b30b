import axios from "axios";
import { config } from "../config";
import type { Notifier } from "../types";
import { logger } from "../utils/logger";

export async function sendTelegramMessage(text: string): Promise<void> {
	if (!config.telegram.botToken || !config.telegram.chatId) {
		logger.debug("Telegram bot token or chat id missing, skipping notification");
		return;
	}

	const url = `https://api.telegram.org/bot${config.telegram.botToken}/sendMessage`;

	await axios.post(
		url,
		{
			chat_id: config.telegram.chatId,
			text,
		},
		{ timeout: config.execution.timeoutMs },
	);
}

export const telegramNotifier: Notifier = {
	notify: sendTelegramMessage,
};
