export { DenylistValidator, FORBIDDEN_KEYWORDS } from './denylist.js';
export type { DenylistValidatorOptions } from './denylist.js';
export { AstValidator } from './ast.js';
export type { AstValidatorOptions } from './ast.js';
export { UnsafeQueryError, describeReason } from './types.js';
export type { QueryValidator, SafeQuery, UnsafeQueryReason } from './types.js';

import { AstValidator } from './ast.js';
import { DenylistValidator } from './denylist.js';
import type { QueryValidator } from './types.js';

export type ValidatorName = 'denylist' | 'ast';

export function createValidator(name: ValidatorName = 'denylist', hardLimit?: number): QueryValidator {
  return name === 'ast' ? new AstValidator({ hardLimit }) : new DenylistValidator({ hardLimit });
}
