// Global test setup
import { config } from 'dotenv';

// Load test environment variables
config({ path: '.env.test' });

jest.setTimeout(30000);

// Logger output goes through console.log
global.console = {
  ...console,
  log: jest.fn(),
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};
