/**
 * Jest Setup File
 * Runs AFTER test framework is installed
 */

// Search tests walk whole trees at small depths; leave them headroom on slow CI.
jest.setTimeout(10000);

afterEach(() => {
  jest.clearAllMocks();
});
