// Global test setup
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
process.env.LOG_ENABLE_CONSOLE = 'false';
process.env.LOG_ENABLE_FILE = 'false';

// Tests configure these explicitly
delete process.env.PORT;
delete process.env.FRONTEND_URL;
delete process.env.VALIDATION_DEFAULT_MODE;
delete process.env.VALIDATION_MAX_LINE_ITEMS;

jest.setTimeout(30000);
