/**
 * CLI Commands - Public API
 */

export { executeIdentifyCommand, type IdentifyCommandDeps } from './identify.js';
export { executeAddCommand, type AddCommandDeps, type AddCommandOptions } from './add.js';
export {
  executeFindCommand,
  executeLatestCommand,
  type FindCommandDeps,
  type LatestCommandDeps,
} from './find.js';
export { describeHandler, type HandlerField } from './describe-handler.js';
