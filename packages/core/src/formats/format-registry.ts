/**
 * Format Registry
 * Named `format` checks. Each format has a predicate for one instance type;
 * the format keyword is a no-op for other types and for unregistered names.
 */

import addFormatsModule, { type FormatName } from 'ajv-formats';

// ajv-formats is CommonJS; the plugin sits on `default`
const addFormats = addFormatsModule.default;

/** Names served by the ajv-formats "full" mode. */
export const AJV_FORMAT_NAMES: readonly FormatName[] = [
  'date',
  'time',
  'date-time',
  'duration',
  'uri',
  'uri-reference',
  'uri-template',
  'url',
  'email',
  'hostname',
  'ipv4',
  'ipv6',
  'regex',
  'uuid',
  'json-pointer',
  'json-pointer-uri-fragment',
  'relative-json-pointer',
  'byte',
  'int32',
  'int64',
  'float',
  'double',
  'password',
  'binary',
];

export type FormatCheck =
  | { readonly type: 'string'; readonly validate: (value: string) => boolean }
  | { readonly type: 'number'; readonly validate: (value: number) => boolean };

export class FormatRegistry {
  private readonly formats = new Map<string, FormatCheck>();

  register(name: string, check: FormatCheck): this {
    this.formats.set(name, check);
    return this;
  }

  registerString(name: string, validate: (value: string) => boolean): this {
    return this.register(name, { type: 'string', validate });
  }

  registerNumber(name: string, validate: (value: number) => boolean): this {
    return this.register(name, { type: 'number', validate });
  }

  unregister(name: string): boolean {
    return this.formats.delete(name);
  }

  get(name: string): FormatCheck | undefined {
    return this.formats.get(name);
  }

  has(name: string): boolean {
    return this.formats.has(name);
  }

  names(): string[] {
    return Array.from(this.formats.keys()).sort();
  }

  clone(): FormatRegistry {
    const copy = new FormatRegistry();
    for (const [name, check] of this.formats) copy.register(name, check);
    return copy;
  }
}

/** Shapes an ajv-formats entry can take. */
type AjvFormat =
  | true
  | string
  | RegExp
  | ((data: string) => boolean)
  | {
      readonly type?: 'string' | 'number';
      readonly async?: boolean;
      readonly validate: unknown;
    };

/** Adapt an ajv-formats definition to a FormatCheck; async ones are skipped. */
export function fromAjvFormat(format: AjvFormat): FormatCheck | undefined {
  if (format === true) {
    return { type: 'string', validate: () => true };
  }
  if (typeof format === 'string') {
    const re = new RegExp(format);
    return { type: 'string', validate: (value) => re.test(value) };
  }
  if (format instanceof RegExp) {
    return { type: 'string', validate: (value) => format.test(value) };
  }
  if (typeof format === 'function') {
    return { type: 'string', validate: format };
  }
  if (format.async) return undefined;

  const { validate } = format;
  if (format.type === 'number') {
    if (typeof validate !== 'function') return undefined;
    return { type: 'number', validate: (value) => validate(value) === true };
  }
  if (typeof validate === 'string' || validate instanceof RegExp) {
    return fromAjvFormat(validate);
  }
  if (typeof validate === 'function') {
    return { type: 'string', validate: (value) => validate(value) === true };
  }
  return undefined;
}

/**
 * Registry preloaded with the ajv-formats "full" set: date, time,
 * date-time, duration, uri, uri-reference, email, hostname, ipv4, ipv6,
 * uuid, regex, json-pointer, byte, int32, int64, float, double, password,
 * binary and the rest.
 */
export function createDefaultFormatRegistry(): FormatRegistry {
  const registry = new FormatRegistry();
  for (const name of AJV_FORMAT_NAMES) {
    const check = fromAjvFormat(addFormats.get(name, 'full'));
    if (check) registry.register(name, check);
  }
  return registry;
}
