/**
 * Typed readers for the free-form `properties` of graph nodes
 */

export type NodeProperties = Record<string, unknown>;

export function stringProp(props: NodeProperties, key: string): string | undefined {
  const value = props[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function numberProp(props: NodeProperties, key: string): number | undefined {
  const value = props[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function stringArrayProp(props: NodeProperties, key: string): string[] | undefined {
  const value = props[key];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Date-like value that parses, returned unchanged; anything else is null
 */
export function validDate(value: string | null | undefined): string | null {
  if (!value) return null;
  return Number.isNaN(Date.parse(value)) ? null : value;
}
