import axios from "axios";
import { logger } from "../utils/logger";

export type Notifier = {
	send(text: string): Promise<void>;
};

export function createTelegramNotifier(options: {
	botToken: string;
	chatId: string;
}): Notifier {
	return {
		async send(text: string): Promise<void> {
			if (!options.botToken || !options.chatId) {
				logger.warn("Telegram bot token or chat id missing, skipping notification");
				return;
			}

			const url = `https://api.telegram.org/bot${options.botToken}/sendMessage`;

			await axios.post(url, {
				chat_id: options.chatId,
				text,
			});
		},
	};
}
