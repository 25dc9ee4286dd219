import { BUILTIN_OPERATIONS } from '@tabflow/operations';
import { OperationRegistry } from './registry.js';

/**
 * Registry with every built-in operation registered
 */
export function createDefaultRegistry(): OperationRegistry {
  const registry = new OperationRegistry();
  for (const definition of BUILTIN_OPERATIONS) {
    registry.registerDefinition(definition);
  }
  return registry;
}
