// Project configuration

export { ConfigService, DEFAULT_CONFIG_DIR } from './config-service.js';
