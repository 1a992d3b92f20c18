import { LauncherError } from './errors.js';
import type { PrimaryKeyType, ViewSpec } from './types.js';

function toPrimaryKeyType(value: string): PrimaryKeyType {
  if (value === 'string' || value === 'int') return value;
  return 'float';
}

/**
 * Parse `view/pk/type[,view/pk/type...]`. Unknown key types fall back to
 * float, matching how the tool itself reads them.
 */
export function parseViewSpecs(value: string): ViewSpec[] {
  return value.split(',').map((entry) => {
    const parts = entry.split('/');
    if (parts.length !== 3 || parts.some((part) => part.length === 0)) {
      throw new LauncherError(
        `Invalid view declaration "${entry}": expected view/primary_key/type`
      );
    }
    const [name, primaryKey, type] = parts;
    return { name, primaryKey, primaryKeyType: toPrimaryKeyType(type) };
  });
}

export function formatViewSpecs(specs: ViewSpec[]): string {
  return specs
    .map((spec) => `${spec.name}/${spec.primaryKey}/${spec.primaryKeyType}`)
    .join(',');
}
