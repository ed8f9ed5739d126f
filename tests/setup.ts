/**
 * Test Setup
 *
 * Runs before every test file: starts the msw server that answers the
 * search APIs and resets logger settings between tests.
 */

import { afterAll, afterEach, beforeAll } from 'vitest';

import { configureLogger } from '../src/utils/logger';
import { server } from './mocks/server';

beforeAll(() => {
  // Any request without a handler is a test bug; nothing may reach the network
  server.listen({ onUnhandledRequest: 'error' });
});

afterEach(() => {
  server.resetHandlers();
  configureLogger({ verbose: false, format: 'text' });
});

afterAll(() => {
  server.close();
});
