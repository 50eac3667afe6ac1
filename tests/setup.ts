// Set test environment
process.env.NODE_ENV = 'test';

// Increase timeout for bcrypt-backed integration tests
jest.setTimeout(30000);
