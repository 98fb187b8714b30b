import { from, type Subscription, timer } from "rxjs";
import { exhaustMap } from "rxjs/operators";
import { logger } from "./logger";

/**
 * Runs `work` every `periodMs`, starting immediately. An iteration still in
 * progress when the next tick fires makes that tick a no-op. A failing
 * iteration is logged; the schedule keeps going until stop().
 */
export class RecurringTask {
	private subscription: Subscription | null = null;
	private iterations = 0;
	private failures = 0;

	constructor(
		readonly name: string,
		private readonly periodMs: number,
		private readonly work: () => Promise<void>,
	) {}

	get running(): boolean {
		return this.subscription !== null;
	}

	get stats(): { iterations: number; failures: number } {
		return { iterations: this.iterations, failures: this.failures };
	}

	start(): void {
		if (this.subscription) return;
		this.subscription = timer(0, this.periodMs)
			.pipe(exhaustMap(() => from(this.runOnce())))
			.subscribe();
		logger.info(
			{ task: this.name, periodMs: this.periodMs },
			"Recurring task started",
		);
	}

	stop(): void {
		if (!this.subscription) return;
		this.subscription.unsubscribe();
		this.subscription = null;
		logger.info({ task: this.name }, "Recurring task stopped");
	}

	async runOnce(): Promise<boolean> {
		this.iterations += 1;
		try {
			await this.work();
			return true;
		} catch (err) {
			this.failures += 1;
			logger.error({ task: this.name, err }, "Recurring task iteration failed");
			return false;
		}
	}
}
