export function hasOwnProperty<K extends string>(
  obj: object,
  prop: K,
): obj is { [key in K]: unknown } {
  return Object.prototype.hasOwnProperty.call(obj, prop);
}
