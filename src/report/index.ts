/**
 * Report generation module.
 * Deterministic. Transforms simulation runs into markdown + JSON artifacts.
 */

export { generateMarkdown, generateJSON, serializeJSON } from './reporter.js';
export type { JsonOutput, JsonOutputTurn } from './reporter.js';
