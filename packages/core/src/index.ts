/**
 * @tabflow/core
 *
 * Dataset handle, scalar model, operation contract and the error taxonomy
 * shared by every tabflow package.
 */

export {
  type Scalar,
  type ScalarKind,
  ScalarSchema,
  isScalar,
  scalarKind,
  scalarsEqual,
  compareNonNull,
  compareScalars,
  tupleKey,
} from './types/scalar.js';

export {
  Dataset,
  DatasetSchema,
  type Row,
  type Provenance,
  type FromRecordsOptions,
} from './dataset.js';

export {
  defineOperation,
  describeParameters,
  describeType,
  type Operation,
  type OperationDefinition,
  type OperationDescriptor,
  type ParameterDescriptor,
  type ParameterSchema,
  type ParamsOf,
} from './operation.js';

export * from './errors.js';

export { createSystemClock, createFixedClock, type ClockPort } from './ports/clock-port.js';
