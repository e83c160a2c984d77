/**
 * Plan library module.
 * Read-only, validated once at load time and cached for the process.
 */

export {
  loadPlanLibrary,
  parseLibraryDocument,
  clearLibraryCache,
  LibraryError,
} from './loader.js';
