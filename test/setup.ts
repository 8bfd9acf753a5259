/**
 * Test Setup
 * Global test configuration and utilities
 */

import { pino } from 'pino';
import { setLogger } from '../src/core/logger.js';

// Keep tests from writing to ~/.stepwise/logs
setLogger(pino({ level: 'silent' }));
