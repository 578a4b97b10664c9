/**
 * Jest Environment Setup
 * Runs BEFORE test framework is installed
 */

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';

