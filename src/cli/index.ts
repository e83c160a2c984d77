/** Command registration for the plangraph CLI. */

export { registerValidateCommand, registerSimulateCommand, loadScriptFile } from './run.js';
