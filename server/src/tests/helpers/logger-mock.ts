/**
 * Silent stand-in for the structured logger
 */

import { vi } from 'vitest';

export function loggerModule() {
  return {
    structuredLogger: {
      debug: vi.fn(),
      info: vi.fn(),
      warning: vi.fn(),
      error: vi.fn(),
      success: vi.fn(),
      http: vi.fn(),
      recordOpportunity: vi.fn(),
      recordExecution: vi.fn(),
      updateEventTime: vi.fn(),
      getMetrics: vi.fn(() => ({})),
      shutdown: vi.fn(async () => undefined),
    },
  };
}
