export { getDataDirectory, getDatabasePath, resetEnvCache } from './config.js';
