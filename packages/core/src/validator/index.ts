/**
 * Validator module exports
 * Engines implementing the SchemaModel/TypedefSchema boundary
 */

import type { EngineName } from '../types/options.js';
import { createAjvSchemaModel } from './ajv-engine.js';
import { jtdSchemaModel } from './jtd-engine.js';
import type { SchemaModel } from './engine.js';

export function createSchemaModel(engine: EngineName): SchemaModel {
  switch (engine) {
    case 'jtd':
      return jtdSchemaModel;
    case 'ajv':
      return createAjvSchemaModel();
  }
}

export {
  internalFault,
  type EngineFault,
  type SchemaModel,
  type TypedefSchema,
  type ValidationError,
} from './engine.js';
export { jtdSchemaModel } from './jtd-engine.js';
export { createAjvSchemaModel } from './ajv-engine.js';
