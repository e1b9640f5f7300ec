import path from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  ConfigError,
  type RouteTree,
  didYouMean,
  isRouteTree,
} from '@routespec/core';

/** Loads the module named on the command line and returns its exports */
export type ModuleLoader = (file: string) => Promise<Record<string, unknown>>;

export const importModule: ModuleLoader = async (file) => {
  const url = pathToFileURL(path.resolve(process.cwd(), file)).href;
  const mod: unknown = await import(url);
  if (typeof mod !== 'object' || mod === null) return {};
  return Object.fromEntries(Object.entries(mod));
};

/**
 * Resolves `exportName` from the module at `file` to a route tree.
 *
 * @throws {ConfigError} When the module cannot be loaded, lacks the export,
 * or the export is not a route tree
 */
export async function loadRouteTree(
  file: string,
  exportName: string,
  loader: ModuleLoader = importModule
): Promise<RouteTree> {
  let exports: Record<string, unknown>;
  try {
    exports = await loader(file);
  } catch (error) {
    throw new ConfigError({
      message: `Cannot load API module ${file}`,
      context: { setting: '--api', value: file },
      cause: error instanceof Error ? error : undefined,
    });
  }

  const value = exports[exportName];
  if (value === undefined) {
    const trees = Object.keys(exports).filter((key) =>
      isRouteTree(exports[key])
    );
    const close = didYouMean(exportName, trees);
    throw new ConfigError({
      message: `Module ${file} has no export named "${exportName}"`,
      context: {
        setting: '--export',
        value: exportName,
        suggestion:
          close.length > 0
            ? `Did you mean --export ${close[0]}?`
            : trees.length > 0
              ? `Route trees exported: ${trees.join(', ')}`
              : undefined,
      },
    });
  }
  if (!isRouteTree(value)) {
    throw new ConfigError({
      message: `Export "${exportName}" of ${file} is not a route tree`,
      context: {
        setting: '--export',
        value: exportName,
        suggestion: 'Export the value built with sub()/alt()/get()',
      },
    });
  }
  return value;
}
