import { LogLevel, setLogLevel } from '../utils/logger';

// Keep test output to failures
setLogLevel(LogLevel.ERROR);
