// Jest setup file

// Keep logger output out of the test report
beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

// Set test timeout
jest.setTimeout(30000);

// Clean up after each test
afterEach(() => {
  jest.restoreAllMocks();
});
