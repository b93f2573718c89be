/**
 * Classification Module
 * Deploy response decoding
 */

export { classifyDeployResult, classifyJobOutput } from './classifier.js';
export {
  componentFailureSchema,
  deployFileSchema,
  sourceConflictSchema,
  deploySucceededSchema,
} from './deployResponse.schema.js';

export type { ClassifiedResult, ClassifiedResultKind } from './classification.types.js';
export type { ComponentFailure, DeployFile } from './deployResponse.schema.js';
