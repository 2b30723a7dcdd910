export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const sleep: Sleep = (ms) =>
	new Promise((resolve) => {
		setTimeout(resolve, Math.max(0, ms));
	});

export const systemClock: Clock = () => Date.now();
