import { ParameterItem, RawParameter } from '../types';

/**
 * Key under which a parameter's own name is recorded
 */
export const PARAMETER_NAME_KEY = 'var_id';

/**
 * Build a name/value pair (flat pairs index better than nested attribute maps)
 */
export function makeParameterItem(name: string, value: string | number | boolean): ParameterItem {
  return {
    name: name.trim(),
    value: String(value).trim(),
  };
}

/**
 * Flatten one parameter into ordered pairs: its name first, then each attribute
 */
export function parameterItems(param: RawParameter): ParameterItem[] {
  const items: ParameterItem[] = [makeParameterItem(PARAMETER_NAME_KEY, param.name)];

  for (const [key, value] of Object.entries(param.attributes ?? {})) {
    if (key.trim() === '') continue;
    items.push(makeParameterItem(key, value));
  }

  return items;
}

export function flattenParameters(params: RawParameter[] | undefined): ParameterItem[] {
  if (!params) return [];
  return params.flatMap((p) => parameterItems(p));
}
