// Global test setup for Jest
import { logger } from './utils/logger';

// Property-based and timeout tests need more than the default 5s
jest.setTimeout(30000);

// Never reach Twilio or a model endpoint from tests, whatever .env says
process.env.BOT_TOKEN = '123456789:ABCdefGHIjklMNOpqrSTUvwxYZ123456789';
process.env.NODE_ENV = 'test';
process.env.DELIVERY_MODE = 'simulated';
process.env.LLM_API_KEY = 'test-key';
delete process.env.TWILIO_ACCOUNT_SID;
delete process.env.TWILIO_AUTH_TOKEN;

beforeEach(() => {
    logger.setLevel('info');
});

// Silence log output; tests that check logging inspect these mocks
global.console = {
    ...console,
    log: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
};
