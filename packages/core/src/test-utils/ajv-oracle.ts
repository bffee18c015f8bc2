import AjvModule, { type AnySchema } from 'ajv';
import addFormatsModule from 'ajv-formats';

// ajv and ajv-formats are CommonJS; their classes sit on `default`
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

type AjvInstance = InstanceType<typeof Ajv>;

let oracle: AjvInstance | undefined;

/**
 * Draft-07 Ajv with ajv-formats, used as a reference implementation in
 * differential tests. Not strict, so unknown keywords behave as ignored.
 */
export function getOracle(): AjvInstance {
  if (!oracle) {
    oracle = new Ajv({ strict: false, allErrors: true, validateFormats: true });
    addFormats(oracle);
  }
  return oracle;
}

export function oracleAccepts(schema: AnySchema, data: unknown): boolean | Promise<unknown> {
  const validate = getOracle().compile(schema);
  return validate(data);
}
