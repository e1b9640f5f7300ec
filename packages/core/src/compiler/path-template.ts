export type PathSegment =
  | { kind: 'static'; literal: string }
  | { kind: 'capture'; name: string; all: boolean };

export type PathTemplate = readonly PathSegment[];

/** `/` for the empty template, `/users/{user_id}` otherwise */
export function renderPath(template: PathTemplate): string {
  if (template.length === 0) return '/';
  return template
    .map((segment) =>
      segment.kind === 'static' ? `/${segment.literal}` : `/{${segment.name}}`
    )
    .join('');
}

/**
 * Identity key: statics compare by literal, captures only by position.
 * `/users/{id}` and `/users/{user_id}` share a key.
 */
export function pathIdentity(template: PathTemplate): string {
  return JSON.stringify(
    template.map((segment) =>
      segment.kind === 'static' ? segment.literal : null
    )
  );
}

export function captureNames(template: PathTemplate): string[] {
  return template.flatMap((segment) =>
    segment.kind === 'capture' ? [segment.name] : []
  );
}

export function operationLocation(method: string, path: string): string {
  return `${method.toUpperCase()} ${path}`;
}
