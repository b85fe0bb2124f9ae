import { afterEach, beforeEach, vi } from 'vitest';

const CONSOLE_METHODS = ['log', 'info', 'debug', 'warn', 'error'] as const;

let spies: Array<ReturnType<typeof vi.spyOn>> = [];

// Loggers write straight to the console
beforeEach(() => {
  spies = CONSOLE_METHODS.map((method) => vi.spyOn(console, method).mockImplementation(() => {}));
});

afterEach(() => {
  for (const spy of spies) spy.mockRestore();
  spies = [];
});
