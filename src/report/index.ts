/**
 * Report module.
 * Turns a finalized RunReport into the JSON contract, a Markdown report
 * and the console summary.
 */

export {
  generateJSON,
  generateMarkdown,
  serializeJSON,
  formatSummary,
  exitCodeFor,
} from './reporter.js';
export type { RunMetadata, JsonOutput, JsonOutputSession } from './reporter.js';
