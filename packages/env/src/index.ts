export { getNodeEnv, getReferenceDataDirectory, isDevelopment, resetEnvCache } from './config.js';
