import { UnresolvedVariableError } from './errors';

/**
 * Variable substitution for step command templates.
 *
 * Replaces `${NAME}` placeholders with bound values. Unbound placeholders are
 * left verbatim unless `strict` is set, in which case every missing name is reported.
 */

const VARIABLE_PATTERN = /\$\{([A-Za-z0-9_]+)\}/g;

export interface BindOptions {
  strict?: boolean;
}

/**
 * List placeholder names in first-seen order.
 * @example
 * extractVariables('docker push ${REGISTRY}/${APP_ID}:${VERSION}')
 * // => ['REGISTRY', 'APP_ID', 'VERSION']
 */
export function extractVariables(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(VARIABLE_PATTERN)) {
    const name = match[1];
    if (!names.includes(name)) names.push(name);
  }
  return names;
}

export function bindVariables(
  template: string,
  variables: Readonly<Record<string, string>>,
  options: BindOptions = {},
): string {
  if (options.strict) {
    const missing = extractVariables(template).filter((name) => !hasBinding(variables, name));
    if (missing.length > 0) throw new UnresolvedVariableError(missing);
  }

  return template.replace(VARIABLE_PATTERN, (placeholder: string, name: string) =>
    hasBinding(variables, name) ? variables[name] : placeholder,
  );
}

/**
 * Merge variable sources; later sources override earlier ones.
 */
export function mergeVariables(
  ...sources: Readonly<Record<string, string>>[]
): Record<string, string> {
  return Object.assign({}, ...sources);
}

function hasBinding(variables: Readonly<Record<string, string>>, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(variables, name);
}
