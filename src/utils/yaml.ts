import { stringify } from 'yaml';

/**
 * Serialize a plain value to YAML with block style and no line folding.
 */
export function toYaml(value: unknown): string {
  return stringify(value, {
    indent: 2,
    lineWidth: 0,
    defaultStringType: 'PLAIN',
    defaultKeyType: 'PLAIN',
    nullStr: '',
  });
}
