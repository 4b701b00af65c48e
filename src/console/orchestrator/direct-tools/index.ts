/**
 * Built-in direct tools and the default registry
 */

import type { StoreClient, ToolDefinition, ToolRegistry } from '../../../common/types.js';
import { getStore } from '../../../common/services/sql-store.js';
import { createToolRegistry } from '../tool-registry.js';
import { createCompetitorMappingTool } from './competitor-mapping.js';
import { createComponentLookupTool } from './component-lookup.js';

export * from './competitor-mapping.js';
export * from './component-lookup.js';
export { entityValues, partitionInputs } from './entities.js';

/**
 * Built-in tool definitions, in dispatch order within each persona
 */
export function createBuiltInToolDefinitions(store: StoreClient): ToolDefinition[] {
  return [createCompetitorMappingTool(store), createComponentLookupTool(store)];
}

let registryInstance: ToolRegistry | null = null;

/**
 * Registry of the built-in tools over the shared warehouse store
 */
export function getDefaultToolRegistry(): ToolRegistry {
  if (!registryInstance) {
    registryInstance = createToolRegistry(createBuiltInToolDefinitions(getStore()));
  }
  return registryInstance;
}
