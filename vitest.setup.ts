import { initializeLogger } from './patrol-client/src/utils/logger.js';

initializeLogger({ consoleOutput: false, fileOutput: false });
