/**
 * Scalar types of the language. `void` only ever appears as a function return type.
 */
export type ValueType = 'int' | 'float' | 'bool';
export type ScalarType = ValueType | 'void';

export function isNumeric(t: ScalarType): t is 'int' | 'float' {
  return t === 'int' || t === 'float';
}

/**
 * Whether a value of type `from` may be stored where `to` is expected.
 *
 * The only implicit conversion is int -> float.
 */
export function isAssignable(to: ScalarType, from: ScalarType): boolean {
  if (to === from) return true;
  return to === 'float' && from === 'int';
}

/**
 * Result type of an arithmetic operator on two numeric operands.
 */
export function promote(a: 'int' | 'float', b: 'int' | 'float'): 'int' | 'float' {
  return a === 'float' || b === 'float' ? 'float' : 'int';
}
