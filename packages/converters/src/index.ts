export { text, password } from './text.js';
export { integer, integerWithDefault, float } from './numeric.js';
export type { IntegerOptions, IntegerWithDefaultOptions, FloatOptions } from './numeric.js';
export { boolean } from './boolean.js';
export { commaList } from './list.js';
export type { CommaListOptions } from './list.js';
export { optionalValue, refine, ensure, fromStringOps } from './combinators.js';
export type { StringOpsOptions } from './combinators.js';
export { standardSchema } from './standardSchema.js';
