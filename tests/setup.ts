// Test setup file
import chalk from 'chalk';

// Service loggers are silent under NODE_ENV=test
process.env.NODE_ENV = 'test';

// Error output is asserted without colour codes
chalk.level = 0;
