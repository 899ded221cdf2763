// test/vitest.setup.ts
import { EventEmitter } from "events";
import { vi, beforeEach, afterEach } from "vitest";

// Sessions attach a listener per test scenario
EventEmitter.defaultMaxListeners = 20;

beforeEach(() => {
    vi.clearAllTimers();
});

afterEach(() => {
    vi.useRealTimers();
    vi.clearAllMocks();
});
