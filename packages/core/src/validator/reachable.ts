import type { TypeDescriptor } from '../schema/descriptor.js';
import type { RouteTree } from '../route/tree.js';

export interface ReachableType {
  descriptor: TypeDescriptor<unknown>;
  /** Where the type was first reached, e.g. `/users body` or `GET /users 200` */
  firstSeen: string;
}

/**
 * Request-body and response-body types of `tree`, deduplicated by id, in
 * the order a left-to-right walk first reaches them.
 */
export function reachableTypes(tree: RouteTree): ReachableType[] {
  const byId = new Map<string, ReachableType>();
  const visit = (
    descriptor: TypeDescriptor<unknown> | undefined,
    firstSeen: string
  ): void => {
    if (descriptor !== undefined && !byId.has(descriptor.id)) {
      byId.set(descriptor.id, { descriptor, firstSeen });
    }
  };

  const walk = (node: RouteTree, path: string): void => {
    switch (node.kind) {
      case 'sequential': {
        const q = node.qualifier;
        if (q.kind === 'body') visit(q.type, `${path || '/'} body`);
        const next =
          q.kind === 'segment'
            ? `${path}/${q.literal}`
            : q.kind === 'capture'
              ? `${path}/{${q.name}}`
              : path;
        walk(node.subtree, next);
        return;
      }
      case 'alternative':
        walk(node.left, path);
        walk(node.right, path);
        return;
      case 'leaf': {
        const { endpoint } = node;
        const where = `${endpoint.method.toUpperCase()} ${path || '/'}`;
        visit(endpoint.response, `${where} ${endpoint.status ?? 200}`);
        for (const [status, response] of Object.entries(
          endpoint.responses ?? {}
        )) {
          visit(response.type, `${where} ${status}`);
        }
        return;
      }
    }
  };

  walk(tree, '');
  return [...byId.values()];
}
