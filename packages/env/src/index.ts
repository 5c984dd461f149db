export { getTaxationEnvDefaults, parseEnv, toTaxationDefaults } from './config.js';
export type { TaxationEnvDefaults } from './config.js';
