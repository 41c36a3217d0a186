import AjvModule, { type Options } from 'ajv';

// ajv is CommonJS; under ESM the default import is module.exports
const Ajv = AjvModule.default;

export function createAjv(options: Options = {}): InstanceType<typeof Ajv> {
  return new Ajv(options);
}
