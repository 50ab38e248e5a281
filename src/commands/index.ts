export { registerRun } from './run.js';
export { registerStatus } from './status.js';
export { registerList } from './list.js';
export { registerDoctor } from './doctor.js';
export { registerClean } from './clean.js';
export { registerConfig } from './config.js';
export { registerVersion } from './version.js';
