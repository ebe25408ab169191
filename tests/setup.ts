/**
 * Test Setup
 *
 * This file runs before all tests to set up the testing environment.
 */

import { afterAll, afterEach, beforeAll } from 'vitest';
import { server } from './mocks/server';

// Placeholder credentials; no test reaches a real provider
process.env.OPENROUTER_API_KEY = 'test-secret';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';

// Start MSW server before all tests. Any request without a handler fails the test.
beforeAll(() => {
  server.listen({ onUnhandledRequest: 'error' });
});

// Reset handlers after each test (in case a test modifies them)
afterEach(() => {
  server.resetHandlers();
});

// Close MSW server after all tests
afterAll(() => {
  server.close();
});
