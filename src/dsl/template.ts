/**
 * `${{ name }}` placeholders in step inputs, resolved per run.
 */

const PLACEHOLDER = /\$\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

/** Replace known placeholders in a string; unknown names are left as written. */
export function interpolate(template: string, vars: Record<string, string>): string {
  return template.replace(PLACEHOLDER, (match: string, name: string) =>
    Object.prototype.hasOwnProperty.call(vars, name) ? vars[name] : match,
  );
}

/** Interpolate every string value of an input object, recursing into arrays and objects. */
export function interpolateInputs(
  inputs: Record<string, unknown>,
  vars: Record<string, string>,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(inputs)) {
    result[key] = interpolateValue(value, vars);
  }
  return result;
}

function interpolateValue(value: unknown, vars: Record<string, string>): unknown {
  if (typeof value === 'string') return interpolate(value, vars);
  if (Array.isArray(value)) return value.map((item: unknown) => interpolateValue(item, vars));
  if (typeof value === 'object' && value !== null) {
    const nested: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      nested[key] = interpolateValue(item, vars);
    }
    return nested;
  }
  return value;
}
