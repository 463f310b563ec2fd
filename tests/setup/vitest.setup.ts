// Global Vitest setup: fail fast on async leaks and keep suites isolated

import { afterEach } from "vitest";

// Fail tests on unhandled promise rejections to avoid silent timeouts
process.on("unhandledRejection", (reason) => {
	throw reason;
});

afterEach(() => {
	vi.restoreAllMocks();
	vi.unstubAllEnvs();
});
