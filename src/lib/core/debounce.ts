export interface DebouncedFunction<A extends unknown[]> {
	(...args: A): void;
	cancel(): void;
}

export function debounce<A extends unknown[]>(
	fn: (...args: A) => void,
	delay: number,
	immediate = false,
): DebouncedFunction<A> {
	let timeout: NodeJS.Timeout | null = null;

	const debounced = (...args: A) => {
		const later = () => {
			timeout = null;
			if (!immediate) {
				fn(...args);
			}
		};

		const callNow = immediate && !timeout;

		if (timeout) {
			clearTimeout(timeout);
		}
		timeout = setTimeout(later, delay);

		if (callNow) {
			fn(...args);
		}
	};

	return Object.assign(debounced, {
		cancel: () => {
			if (timeout) {
				clearTimeout(timeout);
				timeout = null;
			}
		},
	});
}
