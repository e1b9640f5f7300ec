import type { RouteTree, ValidateOptions } from '@routespec/core';

export interface EngineRunOptions {
  tree: RouteTree;
  apiId: string;
  options?: ValidateOptions;
  labels?: string[];
  /** Clock used for `meta.timestamp` */
  now?: () => Date;
}
