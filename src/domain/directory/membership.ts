/**
 * Append a value to an ordered list unless it is already there.
 * Returns true when the list changed.
 */
export function appendUnique(list: string[], value: string): boolean {
  if (list.includes(value)) {
    return false;
  }
  list.push(value);
  return true;
}

/**
 * Remove every occurrence of a value from a list in place.
 * Returns true when the list changed.
 */
export function removeValue(list: string[], value: string): boolean {
  const before = list.length;
  for (let i = list.length - 1; i >= 0; i--) {
    if (list[i] === value) {
      list.splice(i, 1);
    }
  }
  return list.length !== before;
}
