export type RunState = "running" | "paused" | "cancelled";

/**
 * Cooperative run control. The orchestrator polls `state()` between items; a paused run stops after
 * the current item, a cancelled one as soon as it notices.
 */
export interface RunControl {
	state(): RunState;
	pause(): void;
	resume(): void;
	/** Final: a cancelled run is never resumed or paused again. */
	cancel(): void;
	/** Resolves with the state after the next change, or the current state once the timeout passes. */
	waitForChange(timeoutMs: number): Promise<RunState>;
}

export function createRunControl(initial: RunState = "running"): RunControl {
	let current = initial;
	const listeners = new Set<(state: RunState) => void>();

	return {
		state: () => current,
		pause: () => transition("paused"),
		resume: () => transition("running"),
		cancel: () => transition("cancelled"),
		waitForChange,
	};

	function transition(next: RunState): void {
		if (current === "cancelled" || current === next) {
			return;
		}
		current = next;
		for (const listener of [...listeners]) {
			listener(next);
		}
	}

	function waitForChange(timeoutMs: number): Promise<RunState> {
		return new Promise(resolve => {
			const timer = setTimeout(() => finish(current), timeoutMs);
			function finish(state: RunState): void {
				clearTimeout(timer);
				listeners.delete(finish);
				resolve(state);
			}
			listeners.add(finish);
		});
	}
}
