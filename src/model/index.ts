/**
 * Model loading and cross-operation validation.
 *
 * @packageDocumentation
 */

export type {
  Severity,
  ValidationEventId,
  ValidationEvent,
  OperationShape,
  LoadModelOptions,
  LoadedModel,
} from './types.js';
export { ModelLoadError, parseModel, loadModel } from './loader.js';
export { validateModelDocument, MODEL_SCHEMA_URL } from './schema.js';
export { locateOperationKey } from './locate.js';
export { findHttpConflicts, findTopicConflicts } from './conflicts.js';
