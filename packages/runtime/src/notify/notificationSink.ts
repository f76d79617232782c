import type { ModuleLogger, Signal } from "@rsiwatch/core";

export interface NotificationSink {
	notify(message: string, signal: Signal): void | Promise<void>;
}

export class ConsoleNotificationSink implements NotificationSink {
	constructor(
		private readonly write: (line: string) => void = (line) => console.log(line)
	) {}

	notify(message: string): void {
		this.write(message);
	}
}

/** Mirrors alerts into the structured log stream. */
export class LoggerNotificationSink implements NotificationSink {
	constructor(
		private readonly logger: ModuleLogger,
		private readonly symbol?: string
	) {}

	notify(message: string, signal: Signal): void {
		this.logger.info("signal_emitted", {
			symbol: this.symbol,
			kind: signal.kind,
			rsi: signal.rsi,
			evaluatedAt: new Date(signal.evaluatedAt).toISOString(),
			message,
		});
	}
}
