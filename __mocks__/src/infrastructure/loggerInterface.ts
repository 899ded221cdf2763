// __mocks__/src/infrastructure/loggerInterface.ts
import { vi } from "vitest";
import type { ILogger } from "../../../src/infrastructure/loggerInterface.js";

export const createMockLogger = (): ILogger => {
    const mockLogger: ILogger = {
        info: vi.fn(() => {}),
        warn: vi.fn(() => {}),
        error: vi.fn(() => {}),
        debug: vi.fn(() => {}),
        isDebugEnabled: vi.fn(() => false),
        setCorrelationId: vi.fn(() => {}),
        removeCorrelationId: vi.fn(() => {}),
    };

    return mockLogger;
};
