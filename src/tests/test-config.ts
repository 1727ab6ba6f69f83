import path from 'path';

/**
 * Centralized configuration for all test output directories.
 */

// Base directory for ALL test outputs
const TEST_OUTPUT_BASE = path.join(process.cwd(), '.test-outputs');

export const TestPaths = {
  base: TEST_OUTPUT_BASE,

  unit: {
    base: path.join(TEST_OUTPUT_BASE, 'unit'),
    configManager: path.join(TEST_OUTPUT_BASE, 'unit', 'config-manager'),
    fileUtils: path.join(TEST_OUTPUT_BASE, 'unit', 'file-utils'),
    transfer: path.join(TEST_OUTPUT_BASE, 'unit', 'transfer'),
    exporter: path.join(TEST_OUTPUT_BASE, 'unit', 'exporter'),
    pipeline: path.join(TEST_OUTPUT_BASE, 'unit', 'pipeline'),
  },
};
