/**
 * Runs before the test framework loads, so config sees these values.
 */
process.env.NODE_ENV = 'test';
process.env.CORS_ORIGIN = '*';
process.env.PORT = '3001';
process.env.LOG_LEVEL = 'error'; // Reduce logging noise during tests
process.env.DATABASE_URL = ':memory:';
process.env.AI_ENABLED = 'false';
process.env.OPENAI_API_KEY = '';
