/**
 * Handler for `tabflow operations`
 */

import type { OperationDescriptor } from '@tabflow/core';
import { createDefaultRegistry, type OperationRegistry } from '@tabflow/engine';

export function listOperationsHandler(
  registry: OperationRegistry = createDefaultRegistry()
): OperationDescriptor[] {
  return registry.describeAll();
}
